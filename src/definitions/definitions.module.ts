import { Module } from '@nestjs/common';
import { DefinitionStoreService } from './definition-store.service';

@Module({
  providers: [DefinitionStoreService],
  exports: [DefinitionStoreService],
})
export class DefinitionsModule {}

import {
  BadRequestException,
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiTags } from '@nestjs/swagger';
import { toHttpException } from '../../common/http-errors';
import { normalizeEvent } from '../../intake/event-normalizer';
import { IntakeService } from '../../intake/intake.service';

@Controller('webhooks/git')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(private readonly intake: IntakeService) {}

  /**
   * Receive a repository event (GitHub, GitLab, or the generic form) and submit one run
   * per pipeline registered for the repository.
   */
  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Receive a git push / pull request webhook and trigger runs' })
  @ApiHeader({ name: 'X-GitHub-Event', required: false, description: 'push or pull_request' })
  @ApiHeader({
    name: 'X-Gitlab-Event',
    required: false,
    description: 'Push Hook or Merge Request Hook',
  })
  @ApiBody({
    description:
      'Forge payload, or {repository, branch, commitSha, eventType} when no forge header is sent.',
    schema: { type: 'object', additionalProperties: true },
  })
  async receive(
    @Headers('x-github-event') github: string | undefined,
    @Headers('x-gitlab-event') gitlab: string | undefined,
    @Body() body: unknown,
  ) {
    const normalized = normalizeEvent({ github, gitlab }, body);
    if (normalized.kind === 'invalid') {
      throw new BadRequestException(`Unrecognised event payload: ${normalized.reason}`);
    }
    if (normalized.kind === 'ignored') {
      return { status: 'ignored', reason: normalized.reason };
    }

    try {
      const result = await this.intake.dispatch(normalized.event);
      return { status: 'accepted', ...result };
    } catch (err) {
      throw toHttpException(err);
    }
  }
}

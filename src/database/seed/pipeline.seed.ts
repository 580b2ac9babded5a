import { Pipeline } from '../entities/pipeline.entity';

/**
 * Example pipelines inserted on first app start when no pipelines exist.
 */
export const PIPELINE_SEED: Array<Pick<Pipeline, 'name' | 'repository' | 'definition'>> = [
  {
    name: 'frontend-app',
    repository: 'example/frontend-app',
    definition: `name: frontend-app
on:
  push:
    branches: [main, "release/**"]
  pull_request:
    branches: [main]
jobs:
  build:
    timeout-minutes: 15
    steps:
      - name: install
        run: npm ci
      - name: build
        run: npm run build
  test:
    needs: [build]
    steps:
      - name: test
        run: npm test
`,
  },
  {
    name: 'backend-api',
    repository: 'example/backend-api',
    definition: `name: backend-api
on:
  push:
    branches-ignore: ["dependabot/**"]
env:
  NODE_ENV: production
jobs:
  build:
    steps:
      - name: install
        run: npm ci
      - name: build
        run: npm run build
  deploy-staging:
    needs: [build]
    branches: [main]
    steps:
      - name: deploy
        run: ./deploy.sh staging
`,
  },
  {
    name: 'docs',
    repository: 'example/docs',
    definition: `name: docs
jobs:
  build:
    steps:
      - run: npm run build
`,
  },
];

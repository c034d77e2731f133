import { defineWorkspace } from 'vitest/config';

// Each workspace carries its own vitest.config.ts; `npm test` at the root runs them all.
export default defineWorkspace(['packages/*', 'apps/*']);

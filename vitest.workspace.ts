import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/pool', 'packages/shared', 'packages/test-utils']);

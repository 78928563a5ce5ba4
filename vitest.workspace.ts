import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/shared', 'services/user-service', 'services/company-service']);

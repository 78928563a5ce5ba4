/**
 * services/user-service/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - DI creates infra (store, peer client); module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { CompanyClient } from '../../peers/company/company.client';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';
import { UserService } from './user.service';
import type { UserStore } from './user.store';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { userStore: UserStore; companyClient: CompanyClient }) {
  const userService = new UserService({
    userStore: deps.userStore,
    companyClient: deps.companyClient,
  });

  const controller = new UserController(userService);

  return {
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}

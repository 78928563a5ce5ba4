/**
 * services/company-service/src/modules/companies/company.module.ts
 *
 * WHY:
 * - Encapsulates Companies module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { UserClient } from '../../peers/user/user.client';
import { CompanyController } from './company.controller';
import { registerCompanyRoutes } from './company.routes';
import { CompanyService } from './company.service';
import type { CompanyStore } from './company.store';

export type CompanyModule = ReturnType<typeof createCompanyModule>;

export function createCompanyModule(deps: { companyStore: CompanyStore; userClient: UserClient }) {
  const companyService = new CompanyService({
    companyStore: deps.companyStore,
    userClient: deps.userClient,
  });

  const controller = new CompanyController(companyService);

  return {
    companyService,
    registerRoutes(app: FastifyInstance) {
      registerCompanyRoutes(app, controller);
    },
  };
}

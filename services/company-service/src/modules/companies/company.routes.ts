/**
 * services/company-service/src/modules/companies/company.routes.ts
 *
 * WHY:
 * - Declares Companies module endpoints.
 *
 * RULES:
 * - No business logic here.
 * - The company param is `:id` on every route (find-my-way needs one name per segment).
 */

import type { FastifyInstance } from 'fastify';

import { API_PREFIX } from '@roster/shared/http/validate';

import type { CompanyController } from './company.controller';

export function registerCompanyRoutes(app: FastifyInstance, controller: CompanyController) {
  const base = `${API_PREFIX}/companies`;

  app.get(base, controller.listCompanies.bind(controller));
  app.get(`${base}/by-ids`, controller.getCompaniesByIds.bind(controller));
  app.get(`${base}/:id`, controller.getCompany.bind(controller));
  app.post(base, controller.createCompany.bind(controller));
  app.put(`${base}/:id`, controller.updateCompany.bind(controller));
  app.delete(`${base}/:id`, controller.deleteCompany.bind(controller));

  app.post(`${base}/:id/employees/:employeeId`, controller.addEmployee.bind(controller));
  app.delete(`${base}/:id/employees/:employeeId`, controller.removeEmployee.bind(controller));
}

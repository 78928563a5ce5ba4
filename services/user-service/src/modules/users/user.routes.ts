/**
 * services/user-service/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - /users/by-ids is registered before /users/:id (static segments win anyway,
 *   but the order documents intent).
 */

import type { FastifyInstance } from 'fastify';

import { API_PREFIX } from '@roster/shared/http/validate';

import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  const base = `${API_PREFIX}/users`;

  app.get(base, controller.listUsers.bind(controller));
  app.get(`${base}/by-ids`, controller.getUsersByIds.bind(controller));
  app.get(`${base}/:id`, controller.getUser.bind(controller));
  app.post(base, controller.createUser.bind(controller));
  app.put(`${base}/:id`, controller.updateUser.bind(controller));
  app.delete(`${base}/:id`, controller.deleteUser.bind(controller));

  // Called by company-service when an employee is added to or removed from a company.
  app.put(`${base}/:id/company`, controller.setUserCompany.bind(controller));
}

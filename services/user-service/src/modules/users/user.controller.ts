/**
 * services/user-service/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates params, query and body and shapes the response status.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError (via parseRequest).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { idParamsSchema, idsQuerySchema } from '@roster/shared/http/params';
import { toFlowContext } from '@roster/shared/http/request-context';
import { parseRequest } from '@roster/shared/http/validate';

import {
  createUserSchema,
  listUsersQuerySchema,
  setUserCompanySchema,
  updateUserSchema,
} from './user.schemas';
import type { UserService } from './user.service';

export class UserController {
  constructor(private readonly userService: UserService) {}

  async listUsers(req: FastifyRequest, reply: FastifyReply) {
    const query = parseRequest(listUsersQuerySchema, req.query, 'Invalid query parameters');

    const page = await this.userService.listUsers(toFlowContext(req), query);
    return reply.status(200).send(page);
  }

  async getUsersByIds(req: FastifyRequest, reply: FastifyReply) {
    const { ids } = parseRequest(idsQuerySchema, req.query, 'Invalid ids');

    const users = await this.userService.getUsersByIds(ids);
    return reply.status(200).send(users);
  }

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseRequest(idParamsSchema, req.params, 'Invalid user id');

    const user = await this.userService.getUser(toFlowContext(req), id);
    return reply.status(200).send(user);
  }

  async createUser(req: FastifyRequest, reply: FastifyReply) {
    const body = parseRequest(createUserSchema, req.body, 'Invalid request body');

    const user = await this.userService.createUser(toFlowContext(req), body);
    return reply.status(201).send(user);
  }

  async updateUser(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseRequest(idParamsSchema, req.params, 'Invalid user id');
    const body = parseRequest(updateUserSchema, req.body, 'Invalid request body');

    const user = await this.userService.updateUser(toFlowContext(req), id, body);
    return reply.status(200).send(user);
  }

  async deleteUser(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseRequest(idParamsSchema, req.params, 'Invalid user id');

    await this.userService.deleteUser(toFlowContext(req), id);
    return reply.status(204).send();
  }

  async setUserCompany(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseRequest(idParamsSchema, req.params, 'Invalid user id');
    const companyId = parseRequest(setUserCompanySchema, req.body, 'Invalid company id');

    await this.userService.setUserCompany(toFlowContext(req), id, companyId);
    return reply.status(204).send();
  }
}

/**
 * services/company-service/src/modules/companies/company.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
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
  createCompanySchema,
  employeeParamsSchema,
  listCompaniesQuerySchema,
  updateCompanySchema,
} from './company.schemas';
import type { CompanyService } from './company.service';

export class CompanyController {
  constructor(private readonly companyService: CompanyService) {}

  async listCompanies(req: FastifyRequest, reply: FastifyReply) {
    const query = parseRequest(listCompaniesQuerySchema, req.query, 'Invalid query parameters');

    const page = await this.companyService.listCompanies(toFlowContext(req), query);
    return reply.status(200).send(page);
  }

  async getCompaniesByIds(req: FastifyRequest, reply: FastifyReply) {
    const { ids } = parseRequest(idsQuerySchema, req.query, 'Invalid ids');

    const companies = await this.companyService.getCompaniesByIds(ids);
    return reply.status(200).send(companies);
  }

  async getCompany(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseRequest(idParamsSchema, req.params, 'Invalid company id');

    const company = await this.companyService.getCompany(toFlowContext(req), id);
    return reply.status(200).send(company);
  }

  async createCompany(req: FastifyRequest, reply: FastifyReply) {
    const body = parseRequest(createCompanySchema, req.body, 'Invalid request body');

    const company = await this.companyService.createCompany(toFlowContext(req), body);
    return reply.status(201).send(company);
  }

  async updateCompany(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseRequest(idParamsSchema, req.params, 'Invalid company id');
    const body = parseRequest(updateCompanySchema, req.body, 'Invalid request body');

    const company = await this.companyService.updateCompany(toFlowContext(req), id, body);
    return reply.status(200).send(company);
  }

  async deleteCompany(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseRequest(idParamsSchema, req.params, 'Invalid company id');

    await this.companyService.deleteCompany(toFlowContext(req), id);
    return reply.status(204).send();
  }

  async addEmployee(req: FastifyRequest, reply: FastifyReply) {
    const { id, employeeId } = parseRequest(employeeParamsSchema, req.params, 'Invalid ids');

    const company = await this.companyService.addEmployee(toFlowContext(req), id, employeeId);
    return reply.status(200).send(company);
  }

  async removeEmployee(req: FastifyRequest, reply: FastifyReply) {
    const { id, employeeId } = parseRequest(employeeParamsSchema, req.params, 'Invalid ids');

    const company = await this.companyService.removeEmployee(toFlowContext(req), id, employeeId);
    return reply.status(200).send(company);
  }
}

/**
 * services/company-service/src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole service.
 * - Creates infra ONCE (db or in-memory store, user-service HTTP client).
 * - Keeps modules testable: tests swap the peer transport through `overrides`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which store, which peer URL) belong HERE.
 */

import type { AxiosAdapter } from 'axios';

import { createDb } from '@roster/shared/db/db';
import { logger, type Logger } from '@roster/shared/logger/logger';
import { createPeerHttp, PeerHttpClient } from '@roster/shared/peer/peer-http';

import type { CompanyDatabase } from '../db/schema';
import { createCompanyModule, type CompanyModule } from '../modules/companies/company.module';
import type { CompanyStore } from '../modules/companies/company.store';
import { InMemCompanyStore } from '../modules/companies/dal/inmem-company.store';
import { KyselyCompanyStore } from '../modules/companies/dal/kysely-company.store';
import { HttpUserClient, type UserClient } from '../peers/user/user.client';
import type { AppConfig } from './config';

export type AppDeps = {
  logger: Logger;

  companyStore: CompanyStore;
  userClient: UserClient;

  // modules
  companies: CompanyModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  /** Transport for user-service calls (tests route it to an in-process app). */
  userPeerAdapter?: AxiosAdapter;
};

function buildCompanyStore(config: AppConfig): { store: CompanyStore; close: () => Promise<void> } {
  if (config.storeDriver === 'memory') {
    return { store: new InMemCompanyStore(), close: async () => {} };
  }

  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required when STORE_DRIVER=postgres');
  }

  const db = createDb<CompanyDatabase>(config.databaseUrl);
  return { store: new KyselyCompanyStore(db), close: () => db.destroy() };
}

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const { store: companyStore, close: closeStore } = buildCompanyStore(config);

  const userHttp = createPeerHttp({
    baseUrl: config.userServiceUrl,
    timeoutMs: config.peerTimeoutMs,
    adapter: overrides.userPeerAdapter,
  });
  const userClient: UserClient = new HttpUserClient(new PeerHttpClient(userHttp, 'user-service'));

  const companies = createCompanyModule({ companyStore, userClient });

  logger.info('deps.ready', {
    flow: 'app.deps',
    storeDriver: config.storeDriver,
    userServiceUrl: config.userServiceUrl,
  });

  return {
    logger,
    companyStore,
    userClient,
    companies,
    close: closeStore,
  };
}

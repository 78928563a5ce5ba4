/**
 * services/user-service/src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole service.
 * - Creates infra ONCE (db or in-memory store, company-service HTTP client).
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

import type { UserDatabase } from '../db/schema';
import { KyselyUserStore } from '../modules/users/dal/kysely-user.store';
import { InMemUserStore } from '../modules/users/dal/inmem-user.store';
import { createUserModule, type UserModule } from '../modules/users/user.module';
import type { UserStore } from '../modules/users/user.store';
import { HttpCompanyClient, type CompanyClient } from '../peers/company/company.client';
import type { AppConfig } from './config';

export type AppDeps = {
  logger: Logger;

  userStore: UserStore;
  companyClient: CompanyClient;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  /** Transport for company-service calls (tests route it to an in-process app). */
  companyPeerAdapter?: AxiosAdapter;
};

function buildUserStore(config: AppConfig): { store: UserStore; close: () => Promise<void> } {
  if (config.storeDriver === 'memory') {
    return { store: new InMemUserStore(), close: async () => {} };
  }

  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required when STORE_DRIVER=postgres');
  }

  const db = createDb<UserDatabase>(config.databaseUrl);
  return { store: new KyselyUserStore(db), close: () => db.destroy() };
}

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const { store: userStore, close: closeStore } = buildUserStore(config);

  const companyHttp = createPeerHttp({
    baseUrl: config.companyServiceUrl,
    timeoutMs: config.peerTimeoutMs,
    adapter: overrides.companyPeerAdapter,
  });
  const companyClient: CompanyClient = new HttpCompanyClient(
    new PeerHttpClient(companyHttp, 'company-service'),
  );

  const users = createUserModule({ userStore, companyClient });

  logger.info('deps.ready', {
    flow: 'app.deps',
    storeDriver: config.storeDriver,
    companyServiceUrl: config.companyServiceUrl,
  });

  return {
    logger,
    userStore,
    companyClient,
    users,
    close: closeStore,
  };
}

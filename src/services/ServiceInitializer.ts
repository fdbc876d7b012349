// services/ServiceInitializer.ts
import { config as loadEnv } from 'dotenv';
import { Pool } from 'mysql2/promise';
import { loadDatabaseConfig, loadEngineConfig } from '../config/engineConfig';
import { createToolRegistry, ToolContext } from '../lib/tools';
import { ToolRegistry } from '../lib/toolRegistry';
import { EngineConfig } from '../types/access';
import { createLogger } from '../utils/loggers';
import { createPool } from '../utils/mysqlConnection';
import {
  AccessLogRepository,
  MySqlAccessLogRepository,
} from './AccessLogRepository';
import { AccessReportService } from './AccessReportService';
import { TimeAccountingEngine } from './TimeAccounting';

const logger = createLogger('ServiceInitializer');

export type InitializedServices = {
  config: EngineConfig;
  engine: TimeAccountingEngine;
  repository: AccessLogRepository;
  reports: AccessReportService;
  registry: ToolRegistry<ToolContext>;
};

export function initializeServices(
  repository: AccessLogRepository,
  config: EngineConfig,
): InitializedServices {
  const engine = new TimeAccountingEngine(config);
  const reports = new AccessReportService(repository, engine);
  const registry = createToolRegistry();

  logger.info('Access report services initialized', {
    timezone: config.timezone,
    tools: registry.list().length,
  });

  return { config, engine, repository, reports, registry };
}

let pool: Pool | null = null;
let services: InitializedServices | null = null;

/** Process-wide services for the API routes, built on first use */
export function getServices(): InitializedServices {
  if (!services) {
    loadEnv();
    const config = loadEngineConfig();
    pool = createPool(loadDatabaseConfig());
    services = initializeServices(new MySqlAccessLogRepository(pool), config);
  }
  return services;
}

export async function shutdownServices(): Promise<void> {
  if (pool) {
    await pool.end();
    logger.info('MySQL pool closed');
  }
  pool = null;
  services = null;
}

// Report Pipeline — one batch run: user directory → hierarchy index → traversal → reports

import * as path from 'node:path';
import ConfigManager from './config-manager';
import { loadConnectionSettings } from './connection-settings';
import DataverseRecordStore from './dataverse/dataverse-record-store';
import { DataverseSession } from './dataverse/dataverse-session';
import DataverseFileSink from './dataverse/file-upload-sink';
import DirectorySink from './directory-sink';
import { attempt } from './errors';
import Logger from './logger';
import ReportEmitter from './report-emitter';
import HierarchyIndex from './reporting/hierarchy-index';
import TraversalOrchestrator from './reporting/traversal';
import type { RecordStore, ReporterConfig, ReportSink, ReportWriter, TraversalSummary } from './types';

export interface PipelineDependencies {
  store: RecordStore;
  writer: ReportWriter;
  config: ReporterConfig;
}

/**
 * Fetch the user directory and walk every seed user's hierarchy.
 * A failed user fetch aborts the run; everything after it is isolated per seed.
 */
export async function runReportGeneration({ store, writer, config }: PipelineDependencies): Promise<TraversalSummary> {
  const users = await attempt('user-directory', 'fetching users', () => store.fetchUsers(config.userFilter));
  if (!users.ok) {
    Logger.error(`Error ${users.error.message}`);
    throw users.error;
  }

  const index = new HierarchyIndex(users.value);
  const orchestrator = new TraversalOrchestrator(store, index, writer);
  const summary = await orchestrator.run(config.seedRole);

  Logger.info('Traversal complete:', summary);
  return summary;
}

function createSink(config: ReporterConfig, dataDir: string, session: DataverseSession): ReportSink {
  if (config.delivery === 'directory') {
    return new DirectorySink(path.resolve(dataDir, config.outputDir));
  }
  return new DataverseFileSink(session, { fileAttribute: config.fileAttribute });
}

/** Wire the Dataverse collaborators from config and environment, connect, and run */
export async function runFromEnvironment(dataDir: string, env: NodeJS.ProcessEnv = process.env): Promise<TraversalSummary> {
  const config = new ConfigManager(dataDir).loadConfig();
  const session = new DataverseSession(loadConnectionSettings(env));

  await session.connect();
  Logger.info('Connected to CRM successfully');

  const store = new DataverseRecordStore(session, { productBatchSize: config.productBatchSize });
  const writer = new ReportEmitter(createSink(config, dataDir, session));
  return runReportGeneration({ store, writer, config });
}


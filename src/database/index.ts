/**
 * BNPL Credit Protocol - Database Module Export
 */

export { getPool, closePool, testConnection } from './connection';
export { PgStateStore, ConnectionPool, TransactionClient } from './pg-state-store';
export { SettingsRepository, SettingKey } from './settings.repository';

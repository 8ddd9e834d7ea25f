import {
  DrizzleStore,
  MemoryStore,
  componentLogger,
  createDb,
  createPool,
  type GhlConfig,
  type Store,
} from '@ghl-oauth/token-manager';

const log = componentLogger('store');

export function createStore(config: Pick<GhlConfig, 'databaseUrl' | 'pgSsl'>): Store {
  if (!config.databaseUrl) {
    log.warn('DATABASE_URL not set; integrations are kept in memory and lost on restart');
    return new MemoryStore();
  }
  return new DrizzleStore(createDb(createPool(config.databaseUrl, config.pgSsl)));
}

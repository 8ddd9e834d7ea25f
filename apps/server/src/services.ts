import {
  InstallationFlow,
  OAuthExchanger,
  RefreshService,
  WebhookReceiver,
  systemClock,
  type Clock,
  type GhlConfig,
  type Store,
  type Transport,
} from '@ghl-oauth/token-manager';

export interface Services {
  config: GhlConfig;
  store: Store;
  clock: Clock;
  exchanger: OAuthExchanger;
  refresh: RefreshService;
  installs: InstallationFlow;
  webhooks: WebhookReceiver;
}

export interface ServiceOptions {
  transport?: Transport;
  clock?: Clock;
  /** How often a request waiting on another caller's refresh re-reads the record. */
  pollIntervalMs?: number;
}

export function createServices(config: GhlConfig, store: Store, opts: ServiceOptions = {}): Services {
  const clock = opts.clock ?? systemClock;
  const exchanger = new OAuthExchanger(config, opts.transport);
  const installs = new InstallationFlow(store, exchanger, config, { clock });
  return {
    config,
    store,
    clock,
    exchanger,
    installs,
    refresh: new RefreshService(store, exchanger, config, { clock, pollIntervalMs: opts.pollIntervalMs }),
    webhooks: new WebhookReceiver(store, installs, { clock }),
  };
}

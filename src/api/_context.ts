import { loadConfig, type ServiceConfig } from './_config';
import { NominatimGeocoder } from './_geocode';
import { OperationService } from './_operations';
import { createOperationStore } from './_store';

/**
 * What every handler needs. Handlers are built from a context so tests can
 * supply their own store, geocoder and configuration.
 */
export interface ApiContext {
  config: ServiceConfig;
  service: OperationService;
}

export function createContext(config: ServiceConfig = loadConfig()): ApiContext {
  const store = createOperationStore(config);
  const geocoder = new NominatimGeocoder(config);
  return { config, service: new OperationService(store, geocoder) };
}

let defaultContext: ApiContext | null = null;

/**
 * Context shared by the deployed handlers, created on first use.
 */
export function getDefaultContext(): ApiContext {
  if (!defaultContext) {
    defaultContext = createContext();
  }
  return defaultContext;
}

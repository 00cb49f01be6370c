import { AmpAccessProvider } from './amp-access';
import { ApiKeyProvider } from './api-key';
import { CpgwApiKeyProvider } from './cpgw-api-key';
import { DatadogApiKeyProvider } from './datadog-api-key';
import { DnsDelegationProvider } from './dns-delegation';
import { EnvironmentProvider } from './environment';
import { ServiceAccountProvider } from './service-account';

export * from './amp-access';
export * from './api-key';
export * from './cleanup';
export * from './cpgw-api-key';
export * from './datadog-api-key';
export * from './dns-delegation';
export * from './environment';
export * from './lifecycle';
export * from './service-account';

/** Every control-plane provider, discriminated by `kind`. */
export type ControlPlaneProvider =
  | EnvironmentProvider
  | CpgwApiKeyProvider
  | ServiceAccountProvider
  | ApiKeyProvider
  | DnsDelegationProvider
  | AmpAccessProvider
  | DatadogApiKeyProvider;

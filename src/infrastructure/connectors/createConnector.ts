import type { ConnectorConfig } from "../../shared/config/connectors.config";
import type { Logger } from "../../shared/logging/logger";
import type { ProviderConnector } from "../../ports/ProviderConnector";
import { PlusConnector } from "./PlusConnector";
import { ProxyConnector } from "./ProxyConnector";

export type ConnectorFactory = (config: ConnectorConfig) => ProviderConnector;

export const createConnectorFactory =
  (deps: { logger: Logger; timeoutMs: number }): ConnectorFactory =>
  (config) => {
    const common = { apiUrl: config.apiUrl, apiKey: config.apiKey, timeoutMs: deps.timeoutMs, logger: deps.logger };
    switch (config.kind) {
      case "plus":
        return new PlusConnector({ ...common, mode: config.mode });
      case "proxy":
        return new ProxyConnector(common);
    }
  };

import { validateHttpUrl } from "../../shared/config/env";

export type EndpointPolicy = {
  /** Throws when the connector endpoint may not be used. */
  assertEligible: (apiUrl: string) => void;
};

/**
 * Accepts absolute http/https endpoints; when `allowedHosts` is non-empty the
 * host must be one of them (exact match or a subdomain).
 */
export const createEndpointPolicy = (allowedHosts: string[]): EndpointPolicy => ({
  assertEligible: (apiUrl) => {
    validateHttpUrl("apiUrl", apiUrl);
    if (allowedHosts.length === 0) return;

    const host = new URL(apiUrl).hostname.toLowerCase();
    const allowed = allowedHosts.some((candidate) => host === candidate || host.endsWith(`.${candidate}`));
    if (!allowed) {
      throw new Error(`Connector endpoint ${host} is not in the allowed host list`);
    }
  }
});

import { MjHttpConnector, type SubmitAction } from "./MjHttpConnector";

/** Self-hosted proxy; authenticates with the `mj-api-secret` header. */
export class ProxyConnector extends MjHttpConnector {
  readonly kind = "proxy" as const;

  protected submitUrl(action: SubmitAction): string {
    return `${this.apiUrl}/mj/submit/${action}`;
  }

  protected authHeaders(): Record<string, string> {
    return this.apiKey ? { "mj-api-secret": this.apiKey } : {};
  }
}

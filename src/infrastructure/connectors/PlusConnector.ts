import type { PlusMode } from "../../shared/config/connectors.config";
import { MjHttpConnector, type HttpConnectorOptions, type SubmitAction } from "./MjHttpConnector";

/**
 * Hosted "plus" API: submissions are routed per speed mode and authenticated
 * with a bearer token.
 */
export class PlusConnector extends MjHttpConnector {
  readonly kind = "plus" as const;
  private readonly mode: PlusMode;

  constructor(options: HttpConnectorOptions & { mode: PlusMode }) {
    super(options);
    this.mode = options.mode;
  }

  protected submitUrl(action: SubmitAction): string {
    return `${this.apiUrl}/mj-${this.mode}/mj/submit/${action}`;
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }
}

export class ConnectorRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly isAborted: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl: string;

  constructor(args: { message: string; requestUrl: string; status?: number; isTimeout?: boolean; isAborted?: boolean; retryDelayMs?: number }) {
    super(args.message);
    this.name = "ConnectorRequestError";
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.isAborted = args.isAborted ?? false;
    this.retryDelayMs = args.retryDelayMs;
    this.requestUrl = args.requestUrl;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The provider answered, but refused the submission. */
export class ConnectorRejectedError extends Error {
  readonly code: number;

  constructor(code: number, description: string) {
    super(`Provider rejected task: code=${code} ${description}`.trim());
    this.name = "ConnectorRejectedError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The provider answered with a body we cannot interpret. */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

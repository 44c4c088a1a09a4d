export class BrokerHttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "BrokerHttpError";
  }
}

export class BrokerBackpressureError extends BrokerHttpError {
  constructor(message: string) {
    super(429, message);
    this.name = "BrokerBackpressureError";
  }
}

export class ClientTimeoutError extends Error {
  constructor(
    readonly requestId: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for an answer to ${requestId}`);
    this.name = "ClientTimeoutError";
  }
}

export type FakeClientErrorCode =
  | "MISSING_ARGUMENT"
  | "MISSING_CONFIGURATION"
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_OPERATION"
  | "ASSERTION_FAILED"
  | "API_REQUEST_FAILED";

export class FakeClientError extends Error {
  readonly code: FakeClientErrorCode;

  constructor(code: FakeClientErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingArgumentError extends FakeClientError {
  constructor(
    readonly resourceMethod: string,
    readonly parameter: string,
    readonly wireName: string
  ) {
    super(
      "MISSING_ARGUMENT",
      `Missing required argument '${parameter}' (${wireName}) for ${resourceMethod}`
    );
  }
}

export class MissingConfigurationError extends FakeClientError {
  constructor(
    readonly resourceMethod: string,
    readonly purpose: string,
    readonly parameters: readonly string[]
  ) {
    super(
      "MISSING_CONFIGURATION",
      `${resourceMethod} is missing ${purpose}: provide one of ${parameters.join(", ")}`
    );
  }
}

export class InvalidArgumentError extends FakeClientError {
  constructor(
    readonly resourceMethod: string,
    readonly parameter: string,
    readonly reason: string
  ) {
    super(
      "INVALID_ARGUMENT",
      `Invalid argument '${parameter}' for ${resourceMethod}: ${reason}`
    );
  }
}

export class UnsupportedOperationError extends FakeClientError {
  constructor(
    readonly resource: string,
    readonly method?: string
  ) {
    super(
      "UNSUPPORTED_OPERATION",
      method === undefined
        ? `Unsupported resource '${resource}' on the fake Twilio client`
        : `Unsupported operation ${resource}.${method} on the fake Twilio client`
    );
  }
}

export class CallAssertionError extends FakeClientError {
  constructor(
    message: string,
    readonly expected: Readonly<Record<string, unknown>>,
    readonly closest?: Readonly<Record<string, unknown>>
  ) {
    super("ASSERTION_FAILED", message);
  }
}

export interface ApiFailure {
  status?: number;
  code: number;
  message: string;
  moreInfo?: string;
}

/**
 * Shaped like the REST exception the real client throws for a non-2xx
 * response, so code under test can branch on `status` and `code`.
 */
export class ApiRequestError extends FakeClientError {
  readonly status: number;
  readonly apiCode: number;
  readonly moreInfo: string;

  constructor(
    readonly resourceMethod: string,
    failure: ApiFailure
  ) {
    super("API_REQUEST_FAILED", failure.message);
    this.status = failure.status ?? 400;
    this.apiCode = failure.code;
    this.moreInfo =
      failure.moreInfo ?? `https://www.twilio.com/docs/errors/${failure.code}`;
  }
}

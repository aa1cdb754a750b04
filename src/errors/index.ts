interface BaseErrorParams<T extends string> {
  name: T;
  id: number;
  message: string;
  cause?: unknown;
}

export abstract class BaseError<T extends string = string> extends Error {
  public override name: T;

  public id: number;

  constructor({ name, id, message, cause }: BaseErrorParams<T>) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = name;
    this.id = id;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  override toString() {
    return `Error ${this.id} (${this.name}): ${this.message}`;
  }
}

export class ValidationError extends BaseError<"ValidationError"> {
  constructor({ message }: { message: string }) {
    super({ name: "ValidationError", id: 100, message });
  }
}

export class UpstreamRequestError extends BaseError<"UpstreamRequestError"> {
  constructor({ message, cause }: { message: string; cause?: unknown }) {
    super({ name: "UpstreamRequestError", id: 200, message, cause });
  }
}

export class UpstreamStatusError extends BaseError<"UpstreamStatusError"> {
  public status: number;

  public url: string;

  constructor({ status, url }: { status: number; url: string }) {
    super({
      name: "UpstreamStatusError",
      id: 201,
      message: `Unexpected status ${status} from ${url}`,
    });
    this.status = status;
    this.url = url;
  }
}

export class PayloadDecodeError extends BaseError<"PayloadDecodeError"> {
  constructor({ message, cause }: { message: string; cause?: unknown }) {
    super({ name: "PayloadDecodeError", id: 202, message, cause });
  }
}

export class EmptyPayloadError extends BaseError<"EmptyPayloadError"> {
  constructor({ message }: { message: string }) {
    super({ name: "EmptyPayloadError", id: 203, message });
  }
}

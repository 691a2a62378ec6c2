import { LivestrError } from "../types";

export class RemoteSignerError extends LivestrError {
  constructor(message: string, code = "REMOTE_SIGNER_ERROR") {
    super(message, code);
    this.name = "RemoteSignerError";
  }
}

export class NotConnectedError extends RemoteSignerError {
  constructor(message = "Remote signer is not connected") {
    super(message, "NOT_CONNECTED");
    this.name = "NotConnectedError";
  }
}

export class TimeoutError extends RemoteSignerError {
  constructor(
    public method: string,
    public timeoutMs: number,
  ) {
    super(`${method} timed out after ${timeoutMs}ms`, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

export class AuthenticationError extends RemoteSignerError {
  constructor(message = "Remote signer failed the handshake secret check") {
    super(message, "AUTHENTICATION_FAILED");
    this.name = "AuthenticationError";
  }
}

/** Error string returned by the remote signer itself. */
export class RemoteSignerRemoteError extends RemoteSignerError {
  constructor(
    public method: string,
    public remoteMessage: string,
  ) {
    super(`${method} failed: ${remoteMessage}`, "REMOTE_ERROR");
    this.name = "RemoteSignerRemoteError";
  }
}

export class InvalidResponseError extends RemoteSignerError {
  constructor(message: string) {
    super(message, "INVALID_RESPONSE");
    this.name = "InvalidResponseError";
  }
}

export class InvalidUriError extends RemoteSignerError {
  constructor(message: string) {
    super(message, "INVALID_URI");
    this.name = "InvalidUriError";
  }
}

export class RequestAbortedError extends RemoteSignerError {
  constructor(public method: string) {
    super(`${method} was aborted`, "ABORTED");
    this.name = "RequestAbortedError";
  }
}

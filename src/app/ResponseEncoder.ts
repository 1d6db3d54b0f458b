import type { Writable } from "stream";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import {
  envelopeError,
  ErrorCodes,
  legacyError,
  protocolError,
  type BridgeResponse,
} from "../shared/contracts";

const PEER_CLOSED_CODES = new Set(["EPIPE", "ERR_STREAM_DESTROYED", "ERR_STREAM_WRITE_AFTER_END"]);

export interface ResponseEncoderOptions {
  /** Indented output for humans (direct CLI invocation). */
  pretty?: boolean;
  /** Called once when the reader of the output stream goes away. */
  onPeerClosed?: () => void;
}

export function isPeerClosedError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = "code" in err ? err.code : undefined;
  return typeof code === "string" && PEER_CLOSED_CODES.has(code);
}

/**
 * Writes one response per line. A reader that has gone away is the normal
 * way a session ends, so it is reported at info level and further writes are
 * dropped.
 */
export class ResponseEncoder {
  private peerClosed = false;

  constructor(
    private readonly output: Writable,
    private readonly logger: LoggerPort,
    private readonly options: ResponseEncoderOptions = {}
  ) {
    output.on("error", (err) => this.handleWriteError(err));
  }

  get closed(): boolean {
    return this.peerClosed;
  }

  encode(response: BridgeResponse): string {
    const body = this.options.pretty ? JSON.stringify(response, null, 2) : JSON.stringify(response);
    return `${body}\n`;
  }

  write(response: BridgeResponse): boolean {
    if (this.peerClosed) return false;

    let line: string;
    try {
      line = this.encode(response);
    } catch (err) {
      this.logger.error("Failed to serialize response", { error: (err as Error).message });
      line = this.encode(serializationFallback(response));
    }

    try {
      this.output.write(line, (err) => {
        if (err) this.handleWriteError(err);
      });
    } catch (err) {
      this.handleWriteError(err);
    }
    return !this.peerClosed;
  }

  private handleWriteError(err: unknown): void {
    if (isPeerClosedError(err)) {
      if (this.peerClosed) return;
      this.peerClosed = true;
      this.logger.info("Output closed by peer; shutting down");
      this.options.onPeerClosed?.();
      return;
    }
    this.logger.error("Failed to write response", {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

function serializationFallback(response: BridgeResponse): BridgeResponse {
  const message = "Response could not be serialized";
  if ("jsonrpc" in response) {
    return envelopeError(response.id, protocolError(ErrorCodes.InternalError, message));
  }
  return legacyError(message);
}

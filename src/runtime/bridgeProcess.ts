import type { Readable, Writable } from "stream";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { BridgeInstance } from "../composition/container";
import { isDirectInvocation, type CliOptions } from "../env";
import { ResponseEncoder } from "../app/ResponseEncoder";
import { runDirectInvocation } from "../cli";

export interface BridgeProcessIO {
  stdin: Readable;
  stdout: Writable;
  /** Ends the process right away; called when the reader of stdout goes away. */
  exit: (code: number) => void;
}

/**
 * Runs one bridge session and resolves with the process exit status: the
 * direct invocation's status, or 0 once the input ends.
 */
export async function runBridge(
  bridge: BridgeInstance,
  cli: CliOptions,
  io: BridgeProcessIO,
  logger: LoggerPort
): Promise<number> {
  if (isDirectInvocation(cli)) {
    const encoder = new ResponseEncoder(io.stdout, logger, { pretty: true });
    return runDirectInvocation(bridge.router, cli.positionals, encoder);
  }

  const encoder = new ResponseEncoder(io.stdout, logger, { onPeerClosed: () => io.exit(0) });
  logger.info("Serving requests on stdin");
  await bridge.router.serve(io.stdin, encoder);
  return 0;
}

import { spawn, type ChildProcess } from "child_process";
import { existsSync } from "fs";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { ToolDescriptor } from "../domain/tools/ToolDescriptor";
import { AgentProcessLifecycle } from "../domain/execution/AgentProcessLifecycle";
import type {
  AgentFailureResult,
  ExecutionRequest,
  ExecutionResult,
} from "../domain/execution/ExecutionResult";

export const MAX_DIAGNOSTIC_CHARS = 2000;

export interface AgentExecutorOptions {
  /**
   * Wait between SIGTERM and SIGKILL once an agent has timed out, and for the
   * output pipes to close after an agent has exited.
   */
  killGraceMs: number;
  baseEnv?: NodeJS.ProcessEnv;
  /** Overlaid on the inherited environment of every agent. */
  credentials?: Record<string, string>;
  /** Environment variable set to the agent's working directory, e.g. PYTHONPATH. */
  workspaceEnvVar?: string;
}

export function buildAgentArgv(
  descriptor: ToolDescriptor,
  args: Record<string, unknown>
): string[] {
  const argv = [descriptor.agent.interpreter, descriptor.agent.script];
  for (const { field, flag } of descriptor.agent.cliArgs) {
    const value = args[field];
    if (value === undefined || value === null || value === false) continue;
    if (value === true) {
      argv.push(flag);
    } else if (typeof value === "string" || typeof value === "number") {
      argv.push(flag, String(value));
    }
  }
  return argv;
}

export function truncate(text: string, max: number = MAX_DIAGNOSTIC_CHARS): string {
  return text.length > max ? `${text.slice(0, max)}…[truncated]` : text;
}

/**
 * Runs one agent process per call. The validated arguments go to the agent's
 * stdin as a single JSON document and stdin is closed right after; the agent's
 * stdout must hold exactly one JSON document.
 */
export class AgentExecutor {
  constructor(
    private readonly options: AgentExecutorOptions,
    private readonly logger: LoggerPort
  ) {}

  async run(request: ExecutionRequest, descriptor: ToolDescriptor): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const { agent } = descriptor;

    if (!existsSync(agent.interpreter)) {
      return this.preflightFailure(`Interpreter not found: ${agent.interpreter}`, startedAt);
    }
    if (!existsSync(agent.script)) {
      return this.preflightFailure(`Agent script not found: ${agent.script}`, startedAt);
    }

    const [command, ...args] = buildAgentArgv(descriptor, request.validatedArguments);
    this.logger.info(`Executing agent ${descriptor.name}`, { argv: [command, ...args] });

    return new Promise<ExecutionResult>((resolve) => {
      const lifecycle = new AgentProcessLifecycle();
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let spawnError: Error | null = null;
      let termTimer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;
      let drainTimer: NodeJS.Timeout | undefined;
      let settled = false;

      const settle = (result: ExecutionResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(termTimer);
        clearTimeout(killTimer);
        clearTimeout(drainTimer);
        const diagnostics = Buffer.concat(stderr).toString("utf8").trim();
        if (diagnostics) {
          this.logger.debug(`Agent ${descriptor.name} stderr`, {
            stderr: truncate(diagnostics),
          });
        }
        this.logger.info(`Agent ${descriptor.name} finished: ${result.outcome}`, {
          durationMs: result.durationMs,
          exitCode: result.exitCode,
          states: lifecycle.states.join(" > "),
        });
        resolve(result);
      };

      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          cwd: agent.workingDirectory,
          env: this.buildEnv(descriptor),
          stdio: ["pipe", "pipe", "pipe"],
          shell: false,
        });
      } catch (err) {
        settle(this.preflightFailure(`Failed to start agent: ${(err as Error).message}`, startedAt));
        return;
      }

      this.logger.debug(`Agent ${descriptor.name} started`, { pid: child.pid });
      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (err) => {
        spawnError = err;
        // A process that never started emits no exit event.
        if (child.pid === undefined) {
          lifecycle.dispatch("exited");
          settle(this.preflightFailure(`Failed to start agent: ${err.message}`, startedAt));
        }
      });

      const complete = (code: number | null, signal: NodeJS.Signals | null) => {
        if (lifecycle.timedOut) return;
        const durationMs = Date.now() - startedAt;
        const out = Buffer.concat(stdout).toString("utf8");
        const err = Buffer.concat(stderr).toString("utf8");

        if (spawnError) {
          settle(failure(`Failed to start agent: ${spawnError.message}`, durationMs, code, out));
          return;
        }

        if (code !== 0) {
          const fallback =
            code === null
              ? `Process terminated by signal ${signal ?? "unknown"}`
              : `Process failed with code ${code}`;
          settle(failure(truncate(err.trim()) || fallback, durationMs, code, out));
          return;
        }

        const trimmed = out.trim();
        if (!trimmed) {
          settle({
            outcome: "malformed-output",
            message: "Agent produced no output",
            stdout: "",
            durationMs,
            exitCode: code,
          });
          return;
        }

        try {
          settle({ outcome: "success", payload: JSON.parse(trimmed), durationMs, exitCode: code });
        } catch (parseErr) {
          this.logger.warn(`Agent ${descriptor.name} returned invalid JSON`, {
            error: (parseErr as Error).message,
          });
          settle({
            outcome: "malformed-output",
            message: `Agent returned invalid JSON: ${(parseErr as Error).message}`,
            stdout: truncate(out),
            durationMs,
            exitCode: code,
          });
        }
      };

      child.on("exit", (code, signal) => {
        lifecycle.dispatch("exited");
        // Once timed out the output no longer matters; do not wait for stdio to
        // drain, a grandchild may still hold the pipes open.
        if (lifecycle.timedOut) {
          settle({
            outcome: "timeout",
            message: `Agent execution timed out after ${formatSeconds(agent.timeoutMs)}`,
            killed: lifecycle.value === "KILLED" || signal === "SIGKILL",
            durationMs: Date.now() - startedAt,
            exitCode: code,
          });
          return;
        }
        // A grandchild that inherited stdout or stderr keeps the pipes open
        // after the agent is gone; stop waiting for it once the grace expires.
        drainTimer = setTimeout(() => {
          this.logger.warn(`Agent ${descriptor.name} exited but its output stayed open; closing pipes`, {
            drainMs: this.options.killGraceMs,
          });
          child.stdout?.destroy();
          child.stderr?.destroy();
          complete(code, signal);
        }, this.options.killGraceMs);
      });

      child.on("close", (code, signal) => {
        lifecycle.dispatch("exited");
        complete(code, signal);
      });

      termTimer = setTimeout(() => {
        if (!lifecycle.dispatch("timeoutExpired")) return;
        this.logger.warn(`Agent ${descriptor.name} timed out; sending SIGTERM`, {
          timeoutMs: agent.timeoutMs,
        });
        child.kill("SIGTERM");
        killTimer = setTimeout(() => {
          if (!lifecycle.dispatch("graceExpired")) return;
          this.logger.warn(`Agent ${descriptor.name} ignored SIGTERM; sending SIGKILL`);
          child.kill("SIGKILL");
        }, this.options.killGraceMs);
      }, agent.timeoutMs);

      const stdin = child.stdin;
      if (!stdin) return;
      // The agent may exit without reading its input.
      stdin.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code !== "EPIPE") {
          this.logger.warn(`Failed writing input to agent ${descriptor.name}`, { error: err.message });
        }
      });
      lifecycle.dispatch("inputStarted");
      stdin.end(JSON.stringify(request.validatedArguments), () => {
        lifecycle.dispatch("inputClosed");
      });
    });
  }

  buildEnv(descriptor: ToolDescriptor): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = {
      ...(this.options.baseEnv ?? process.env),
      ...this.options.credentials,
      ...descriptor.agent.env,
    };
    if (this.options.workspaceEnvVar) {
      env[this.options.workspaceEnvVar] = descriptor.agent.workingDirectory;
    }
    return env;
  }

  private preflightFailure(message: string, startedAt: number): AgentFailureResult {
    this.logger.error(message);
    return failure(message, Date.now() - startedAt, null, "");
  }
}

function failure(
  message: string,
  durationMs: number,
  exitCode: number | null,
  stdout: string
): AgentFailureResult {
  return { outcome: "agent-failure", message, stdout: truncate(stdout), durationMs, exitCode };
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}

import type { BridgeConfig } from '../config';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import type { ServerInfo } from '../shared/contracts';
import { NodeTime } from '../adapters/sys/NodeTime';
import { ToolRegistry } from '../domain/tools/ToolRegistry';
import { buildToolDescriptors } from '../domain/tools/catalog';
import { ParameterValidator } from '../domain/validation/ParameterValidator';
import { AgentExecutor } from '../app/AgentExecutor';
import { MetricsRegistry } from '../app/MetricsRegistry';
import { RequestRouter } from '../app/RequestRouter';

export const SERVER_INFO: ServerInfo = {
  name: 'agent-bridge',
  version: '0.1.0',
  description: 'Exposes local agent scripts as callable tools over line-delimited JSON',
};

export interface BridgeInstance {
  router: RequestRouter;
  registry: ToolRegistry;
  metrics: MetricsRegistry;
}

export interface BuildBridgeOptions {
  /** Environment inherited by agents; defaults to process.env. */
  baseEnv?: NodeJS.ProcessEnv;
}

export function buildBridge(
  config: BridgeConfig,
  logger: LoggerPort,
  options: BuildBridgeOptions = {},
): BridgeInstance {
  const registry = new ToolRegistry(buildToolDescriptors(config));
  logger.info(`Registered ${registry.names().length} tools`, { tools: registry.names() });

  const validator = new ParameterValidator(config.security);
  const executor = new AgentExecutor(
    {
      killGraceMs: config.performance.killGraceMs,
      baseEnv: options.baseEnv,
      credentials: config.credentials,
      workspaceEnvVar: config.workspace.envVar,
    },
    logger,
  );
  const metrics = new MetricsRegistry({ enabled: config.performance.collectMetrics }, new NodeTime());

  const router = new RequestRouter({
    registry,
    validator,
    executor,
    metrics,
    logger,
    serverInfo: SERVER_INFO,
  });

  return { router, registry, metrics };
}

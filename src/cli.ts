import type { RequestRouter } from './app/RequestRouter';
import type { ResponseEncoder } from './app/ResponseEncoder';
import { legacyError } from './shared/contracts';

/**
 * One-shot call from a shell: `agent-bridge <tool> [json-params]`.
 * Resolves to the process exit code.
 */
export async function runDirectInvocation(
  router: RequestRouter,
  positionals: string[],
  encoder: ResponseEncoder,
): Promise<number> {
  const [tool, rawParams] = positionals;
  if (!tool) {
    encoder.write(legacyError("Missing 'tool' in payload"));
    return 1;
  }

  let params: unknown = {};
  if (rawParams !== undefined) {
    try {
      params = JSON.parse(rawParams);
    } catch (err) {
      encoder.write(legacyError(`Invalid JSON parameters: ${(err as Error).message}`));
      return 1;
    }
  }

  const response = await router.handleLegacy({ tool, params });
  encoder.write(response);
  return response.status === 'success' ? 0 : 1;
}

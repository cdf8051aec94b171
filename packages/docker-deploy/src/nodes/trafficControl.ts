import {
  ConfigurationError,
  ToolMissingError,
  TransientBackendError,
  errorMessage,
  type LoggerService,
} from '@dyncluster/deploy-core';

import type { DockerClientPort } from '../lib/dockerClient.port';
import type { ExecResult, NetworkAddressBlock } from '../lib/types';

export const FILTER_TOOL = 'iptables';

/** Exit codes a shell reports for a command it cannot find or run. */
const MISSING_TOOL_EXIT_CODES = new Set([126, 127]);
const MISSING_TOOL_RE = /executable file not found|no such file or directory/i;

export type NetworkAddressing = {
  gateway: string;
  /** CIDR covering the addresses nodes are assigned. */
  nodeRange: string;
};

/**
 * Rule sequence that leaves only the gateway able to reach a node over the shared network
 * (or clears every rule when unblocking). Rules are inserted at the top of the chain, so the
 * gateway ACCEPT lands above the range DROP.
 */
export function buildTrafficRules(addressing: NetworkAddressing, blocked: boolean): string[][] {
  const rules: string[][] = [['-F']];
  if (!blocked) return rules;
  rules.push(['-I', 'INPUT', '-s', addressing.nodeRange, '-j', 'DROP']);
  rules.push(['-I', 'INPUT', '-s', addressing.gateway, '-j', 'ACCEPT']);
  return rules;
}

/** Picks the single IPv4 block of the shared network. */
export function resolveAddressing(networkName: string, blocks: NetworkAddressBlock[]): NetworkAddressing {
  const ipv4 = blocks.filter((block) => !`${block.subnet ?? ''}${block.ipRange ?? ''}`.includes(':'));
  if (ipv4.length === 0) {
    throw new ConfigurationError(`Network '${networkName}' has no IPv4 address configuration`);
  }
  if (ipv4.length > 1) {
    throw new ConfigurationError(`Network '${networkName}' has ${ipv4.length} IPv4 address blocks; expected one`);
  }
  const [block] = ipv4;
  const nodeRange = block.ipRange || block.subnet;
  if (!block.gateway) throw new ConfigurationError(`Network '${networkName}' has no gateway address`);
  if (!nodeRange) throw new ConfigurationError(`Network '${networkName}' has no subnet or address range`);
  return { gateway: block.gateway, nodeRange };
}

export type TrafficControllerOptions = {
  docker: DockerClientPort;
  networkName: string;
  logger: LoggerService;
  execTimeoutMs?: number;
};

/**
 * Partitions a node from its peers with packet-filter rules applied inside the node.
 * The filter tool is installed on demand when the node image lacks it.
 */
export class TrafficController {
  private readonly docker: DockerClientPort;
  private readonly networkName: string;
  private readonly logger: LoggerService;
  private readonly execTimeoutMs: number;

  constructor(options: TrafficControllerOptions) {
    this.docker = options.docker;
    this.networkName = options.networkName;
    this.logger = options.logger.child({ component: 'TrafficController' });
    this.execTimeoutMs = options.execTimeoutMs ?? 120_000;
  }

  async setTrafficControl(resourceId: string, blocked: boolean, options: { signal?: AbortSignal } = {}): Promise<void> {
    const network = await this.docker.inspectNetwork(this.networkName);
    const addressing = resolveAddressing(this.networkName, network.addressBlocks);
    const rules = buildTrafficRules(addressing, blocked);
    this.logger.info('Applying traffic control', { resourceId, blocked, ...addressing });

    try {
      await this.applyRules(resourceId, rules, options.signal);
    } catch (err) {
      if (!(err instanceof ToolMissingError)) throw err;
      this.logger.warn(`${FILTER_TOOL} missing in node; installing`, { resourceId });
      await this.installTool(resourceId, options.signal);
      await this.applyRules(resourceId, rules, options.signal);
    }

    await this.logRuleState(resourceId, options.signal);
  }

  private async applyRules(resourceId: string, rules: string[][], signal?: AbortSignal): Promise<void> {
    for (const args of rules) {
      const result = await this.runTool(resourceId, [FILTER_TOOL, ...args], signal);
      if (result.exitCode !== 0) {
        throw new TransientBackendError(
          `${FILTER_TOOL} ${args.join(' ')} exited with ${result.exitCode}: ${result.stderr.trim()}`,
          { resourceId },
        );
      }
    }
  }

  private async installTool(resourceId: string, signal?: AbortSignal): Promise<void> {
    const steps = [
      ['apt-get', 'update'],
      ['apt-get', '-y', 'install', FILTER_TOOL],
    ];
    for (const step of steps) {
      let result: ExecResult;
      try {
        result = await this.runTool(resourceId, step, signal);
      } catch (err) {
        throw new ToolMissingError(FILTER_TOOL, { resourceId, cause: err });
      }
      if (result.exitCode !== 0) {
        throw new ToolMissingError(FILTER_TOOL, {
          resourceId,
          cause: new Error(`${step.join(' ')} exited with ${result.exitCode}: ${result.stderr.trim()}`),
        });
      }
    }
  }

  private async runTool(resourceId: string, command: string[], signal?: AbortSignal): Promise<ExecResult> {
    let result: ExecResult;
    try {
      result = await this.docker.execContainer(resourceId, command, {
        env: { DEBIAN_FRONTEND: 'noninteractive' },
        timeoutMs: this.execTimeoutMs,
        signal,
      });
    } catch (err) {
      if (err instanceof TransientBackendError && MISSING_TOOL_RE.test(err.message)) {
        throw new ToolMissingError(command[0] ?? FILTER_TOOL, { resourceId, cause: err });
      }
      throw err;
    }
    if (MISSING_TOOL_EXIT_CODES.has(result.exitCode)) {
      throw new ToolMissingError(command[0] ?? FILTER_TOOL, { resourceId });
    }
    return result;
  }

  private async logRuleState(resourceId: string, signal?: AbortSignal): Promise<void> {
    try {
      const result = await this.runTool(resourceId, [FILTER_TOOL, '-S'], signal);
      this.logger.debug('Packet filter rules', { resourceId, rules: result.stdout.trim().split('\n') });
    } catch (err) {
      this.logger.warn('Could not list packet filter rules', { resourceId, error: errorMessage(err) });
    }
  }
}

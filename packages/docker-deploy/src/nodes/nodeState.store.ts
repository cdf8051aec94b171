import { z } from 'zod';
import { ConsistencyError, ResourceNotFoundError, errorMessage } from '@dyncluster/deploy-core';

import { createSingleFileTar, readTarEntry } from '../lib/archive.util';
import type { DockerClientPort } from '../lib/dockerClient.port';

/** Write-once metadata persisted inside each node. */
export type NodeState = {
  expiry: Date;
};

export interface NodeStateStore {
  writeState(resourceId: string, state: NodeState): Promise<void>;
  /** `null` when the node never had state written. */
  readState(resourceId: string): Promise<NodeState | null>;
}

export const STATE_PARENT_DIR = '/var/';
export const STATE_DIR = '/var/dyncluster';
export const STATE_ENTRY = 'dyncluster/state';

const persistedStateSchema = z.object({
  expiry: z.string().datetime({ offset: true }),
});

export function encodeNodeState(state: NodeState): string {
  return JSON.stringify({ expiry: state.expiry.toISOString() });
}

export function decodeNodeState(raw: string, resourceId?: string): NodeState {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConsistencyError(`Node state is not valid JSON: ${errorMessage(err)}`, { resourceId, cause: err });
  }
  const parsed = persistedStateSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConsistencyError('Node state is malformed', { resourceId, cause: parsed.error });
  }
  return { expiry: new Date(parsed.data.expiry) };
}

/** Keeps node state as a small JSON file inside the node's own container. */
export class ContainerNodeStateStore implements NodeStateStore {
  constructor(private readonly docker: DockerClientPort) {}

  async writeState(resourceId: string, state: NodeState): Promise<void> {
    const archive = await createSingleFileTar(STATE_ENTRY, encodeNodeState(state));
    await this.docker.putArchive(resourceId, archive, { path: STATE_PARENT_DIR });
  }

  async readState(resourceId: string): Promise<NodeState | null> {
    const details = await this.docker.inspectContainer(resourceId);
    if (!details.running) {
      throw new ResourceNotFoundError(`Node container is not running (state=${details.state})`, { resourceId });
    }
    const archive = await this.docker.getArchive(resourceId, { path: STATE_DIR });
    if (!archive) return null;
    const entry = await readTarEntry(archive, STATE_ENTRY);
    if (!entry) return null;
    return decodeNodeState(entry.toString('utf8'), resourceId);
  }
}

import { createLogger, type Logger } from '@cadence/logger';
import { InvalidNodeError } from './errors.js';
import type { Node } from './node.js';
import type { Player } from './player.js';

export function leastLoaded<T extends { readonly playerCount: number }>(nodes: Iterable<T>): T | null {
  let selected: T | null = null;
  for (const node of nodes) {
    if (!selected || node.playerCount < selected.playerCount) {
      selected = node;
    }
  }
  return selected;
}

export class NodePool {
  private readonly nodes = new Map<string, Node>();
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger({ name: 'node-pool' })) {
    this.logger = logger.child({ scope: 'node-pool' });
  }

  get size(): number {
    return this.nodes.size;
  }

  addNode(node: Node): void {
    if (this.nodes.has(node.id)) {
      throw new InvalidNodeError(`A node with id "${node.id}" is already in the pool`);
    }
    this.nodes.set(node.id, node);
  }

  /** The requested node, or the connected node hosting the fewest players. */
  getNode(id?: string): Node {
    if (id !== undefined) {
      const node = this.nodes.get(id);
      if (!node) {
        throw new InvalidNodeError(`No node with id "${id}" is in the pool`);
      }
      return node;
    }

    const connected = [...this.nodes.values()].filter((node) => node.status === 'connected');
    const selected = leastLoaded(connected);
    if (!selected) {
      throw new InvalidNodeError('No connected Lavalink nodes are available');
    }
    return selected;
  }

  getPlayer(guildId: string): Player | undefined {
    for (const node of this.nodes.values()) {
      const player = node.getPlayer(guildId);
      if (player) {
        return player;
      }
    }
    return undefined;
  }

  async connectAll(userId: string): Promise<number> {
    const nodes = [...this.nodes.values()];
    const results = await Promise.allSettled(nodes.map((node) => node.connect(userId)));

    let connected = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        connected += 1;
        return;
      }
      this.logger.error({ err: result.reason, node: nodes[index]?.id }, 'Failed to connect Lavalink node');
    });

    this.logger.info({ connectedNodes: connected, totalNodes: this.nodes.size }, 'Initialised Lavalink node connections');
    return connected;
  }

  closeAll(): void {
    for (const node of this.nodes.values()) {
      node.close();
    }
  }
}

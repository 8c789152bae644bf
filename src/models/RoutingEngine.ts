import { EventEmitter } from 'events';
import type {
  DataPacket,
  DropReason,
  PacketClass,
  RouteOutcome,
  TopologySnapshot,
} from '../types/Network';
import { NetworkPathfinding } from './NetworkPathfinding';

export type PacketInspector = (packet: DataPacket, nodeId: string, timestamp: number) => void;

export interface RoutingOptions {
  bufferCapacity?: number;
  // Packets each node forwards per tick
  serviceRate?: number;
  inspect?: PacketInspector;
}

export interface RoutingStats {
  injected: number;
  delivered: number;
  dropped: Record<DropReason, number>;
  totalHops: number;
}

interface CachedRoute {
  snapshot: TopologySnapshot;
  path: string[];
}

export class RoutingEngine extends EventEmitter {
  private buffers: Map<string, DataPacket[]> = new Map();
  // In-flight packets only; finished ones live on in `stats`
  private packets: Map<string, DataPacket> = new Map();
  private routeCache: Map<string, CachedRoute> = new Map();
  private packetCount: number = 0;
  private bufferCapacity: number;
  private serviceRate: number;
  private inspect?: PacketInspector;
  private stats: RoutingStats = {
    injected: 0,
    delivered: 0,
    dropped: { 'no-route': 0, 'capacity-exceeded': 0, 'stale-route': 0, preempted: 0 },
    totalHops: 0,
  };

  constructor(options: RoutingOptions = {}) {
    super();
    this.bufferCapacity = options.bufferCapacity ?? 66000;
    this.serviceRate = options.serviceRate ?? Infinity;
    this.inspect = options.inspect;
  }

  public getBuffer(nodeId: string): readonly DataPacket[] {
    return this.buffers.get(nodeId) ?? [];
  }

  public getStats(): RoutingStats {
    return { ...this.stats, dropped: { ...this.stats.dropped } };
  }

  // Latency-shortest node sequence on `snapshot`, or null when unreachable
  public shortestPath(snapshot: TopologySnapshot, from: string, to: string): string[] | null {
    return NetworkPathfinding.findShortestPath(snapshot, from, to)?.nodes ?? null;
  }

  /**
   * Create a packet and queue it at its source. The packet may be dropped
   * immediately when the source buffer is full.
   */
  public createPacket(
    source: string,
    destination: string,
    size: number,
    createdAt: number,
    packetClass: PacketClass = 'data'
  ): DataPacket {
    const packet: DataPacket = {
      id: `packet_${this.packetCount++}`,
      source,
      destination,
      size,
      createdAt,
      holder: source,
      hopCount: 0,
      packetClass,
      status: 'in-flight',
      path: [source],
    };

    this.packets.set(packet.id, packet);
    this.stats.injected++;
    this.enqueue(packet, source);
    this.emit('packetCreated', packet);
    return packet;
  }

  /**
   * Forward one packet by a single hop on `snapshot`.
   * The path is recomputed only when the snapshot differs from the cached one;
   * if the cached next hop is no longer linked the packet is dropped.
   */
  public route(snapshot: TopologySnapshot, packet: DataPacket): RouteOutcome {
    if (packet.status !== 'in-flight') {
      return packet.status === 'delivered'
        ? { kind: 'delivered' }
        : { kind: 'dropped', reason: packet.dropReason ?? 'no-route' };
    }

    const holder = packet.holder;
    this.removeFromBuffer(packet, holder);

    if (holder === packet.destination) {
      packet.status = 'delivered';
      this.release(packet);
      this.stats.delivered++;
      this.emit('packetDelivered', packet);
      return { kind: 'delivered' };
    }

    const cached = this.routeCache.get(packet.id);
    let path: string[] | null = null;

    if (cached && cached.snapshot === snapshot) {
      path = cached.path;
    } else {
      if (cached) {
        const nextHop = this.nextHopOn(cached.path, holder);
        const stillLinked = nextHop !== null &&
          (snapshot.adjacency.get(holder) ?? []).some((neighbor) => neighbor.id === nextHop);
        if (!stillLinked) {
          return this.drop(packet, 'stale-route');
        }
      }

      const found = NetworkPathfinding.findShortestPath(snapshot, holder, packet.destination);
      if (found) {
        path = found.nodes;
        this.routeCache.set(packet.id, { snapshot, path });
      }
    }

    const nextHop = path ? this.nextHopOn(path, holder) : null;
    if (nextHop === null) {
      return this.drop(packet, 'no-route');
    }

    if (!this.enqueue(packet, nextHop)) {
      return { kind: 'dropped', reason: packet.dropReason ?? 'capacity-exceeded' };
    }

    packet.holder = nextHop;
    packet.hopCount++;
    packet.path.push(nextHop);
    this.stats.totalHops++;
    this.inspect?.(packet, nextHop, snapshot.timestamp);
    this.emit('packetRouted', packet, holder, nextHop);
    return { kind: 'advanced', from: holder, nextHop };
  }

  /**
   * Service every buffer once. Work is fixed at the start of the tick, so a
   * packet moves at most one hop per tick.
   */
  public tick(snapshot: TopologySnapshot): RouteOutcome[] {
    const nodeIds = Array.from(this.buffers.keys()).sort();
    const work: DataPacket[] = [];
    for (const nodeId of nodeIds) {
      const buffer = this.buffers.get(nodeId) ?? [];
      const count = Math.min(buffer.length, this.serviceRate);
      work.push(...buffer.slice(0, count));
    }

    return work.map((packet) => this.route(snapshot, packet));
  }

  public inFlightCount(): number {
    return this.packets.size;
  }

  private release(packet: DataPacket): void {
    this.packets.delete(packet.id);
    this.routeCache.delete(packet.id);
  }

  private nextHopOn(path: readonly string[], holder: string): string | null {
    const index = path.indexOf(holder);
    if (index < 0 || index + 1 >= path.length) return null;
    return path[index + 1];
  }

  private removeFromBuffer(packet: DataPacket, nodeId: string): void {
    const buffer = this.buffers.get(nodeId);
    if (!buffer) return;
    const index = buffer.indexOf(packet);
    if (index >= 0) buffer.splice(index, 1);
  }

  // FIFO with tail drop; control traffic evicts the newest queued data packet
  private enqueue(packet: DataPacket, nodeId: string): boolean {
    let buffer = this.buffers.get(nodeId);
    if (!buffer) {
      buffer = [];
      this.buffers.set(nodeId, buffer);
    }

    if (buffer.length < this.bufferCapacity) {
      buffer.push(packet);
      return true;
    }

    if (packet.packetClass === 'control') {
      for (let i = buffer.length - 1; i >= 0; i--) {
        const victim = buffer[i];
        if (victim.packetClass !== 'data') continue;

        buffer.splice(i, 1);
        this.drop(victim, 'preempted');
        buffer.push(packet);
        return true;
      }
    }

    this.drop(packet, 'capacity-exceeded');
    return false;
  }

  private drop(packet: DataPacket, reason: DropReason): RouteOutcome {
    packet.status = 'dropped';
    packet.dropReason = reason;
    this.release(packet);
    this.stats.dropped[reason]++;
    this.emit('packetDropped', packet, reason);
    return { kind: 'dropped', reason };
  }
}

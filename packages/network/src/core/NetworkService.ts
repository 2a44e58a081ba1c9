/**
 * Network service - the operations the tools expose.
 * Owns one NodeNetwork, saves it after every change and reports failures
 * as Result<T, string>. A change that cannot be saved is rolled back.
 */

import type { DuplicateIdWarning, Logger, Result } from "@streamnet/core";
import { Ok, Err, createLogger, mapErr, tryCatch } from "@streamnet/core";
import type {
  InsertNodeOptions,
  NodeRecord,
  NodeSnapshot,
  NodeType,
  NodeTypeFilter,
  Point,
  Position,
  TributaryOrder,
} from "./model.js";
import { NODE_TYPE_INFO } from "./model.js";
import type { NetworkConfig } from "../config.js";
import { NodeNetwork } from "./NodeNetwork.js";
import type { StreamNode } from "./StreamNode.js";
import type { InterpolationOptions, InterpolationReport } from "./GeometryInterpolator.js";
import { GeometryInterpolator } from "./GeometryInterpolator.js";
import { NETWORK_FILE_VERSION, loadNetworkFile, saveNetworkFile } from "./NetworkStorage.js";

export interface NetworkSummary {
  name: string;
  size: number;
  tributaryOrder: TributaryOrder;
  treatDryAsNaturalFlow: boolean;
  reaches: number;
  mostUpstreamId: string;
  counts: Partial<Record<NodeType, number>>;
}

export interface InsertResult {
  node: NodeSnapshot;
  warnings: DuplicateIdWarning[];
}

export interface DeleteResult {
  /** Null when the request named the End node */
  deletedId: string | null;
  size: number;
}

export interface FlowNodes {
  id: string;
  downstreamGage: string | null;
  upstreamGages: string[];
  downstreamNaturalFlowInReach: string | null;
  upstreamNaturalFlowInReach: string | null;
}

export type Direction = "upstream" | "downstream";

/**
 * Run fn, turning both returned and thrown errors into messages.
 */
function guarded<T>(fn: () => Result<T, Error>): Result<T, string> {
  const outcome = tryCatch(fn);
  if (!outcome.ok) return Err(outcome.error.message);
  return mapErr(outcome.value, (error) => error.message);
}

export class NetworkService {
  private readonly network: NodeNetwork;
  private name: string;

  private constructor(
    private readonly projectPath: string,
    private readonly config: NetworkConfig,
    private readonly log: Logger,
    network: NodeNetwork,
    name: string
  ) {
    this.network = network;
    this.name = name;
  }

  /**
   * Load the saved network under projectPath, or start a new one holding
   * only the End node.
   */
  static open(projectPath: string, config: NetworkConfig, log: Logger = createLogger("network")): Result<NetworkService, string> {
    const loaded = loadNetworkFile(projectPath, config.dataDir);
    if (!loaded.ok) return loaded;

    const file = loaded.value;
    if (!file) {
      const network = new NodeNetwork({
        tributaryOrder: config.tributaryOrder,
        treatDryAsNaturalFlow: config.treatDryAsNaturalFlow,
        logger: log,
      });
      return Ok(new NetworkService(projectPath, config, log, network, "Network"));
    }

    if (file.tributaryOrder !== config.tributaryOrder) {
      log.info(`saved network uses ${file.tributaryOrder} tributary order; keeping it`);
    }
    const built = NodeNetwork.fromRecords(file.nodes, {
      headFirst: false,
      tributaryOrder: file.tributaryOrder,
      treatDryAsNaturalFlow: file.treatDryAsNaturalFlow,
      logger: log,
    });
    if (!built.ok) return Err(`Saved network is malformed: ${built.error.message}`);

    if (file.nodes.every((n) => n.serial !== undefined)) {
      const problems = built.value.restoreOrdering(file.nodes);
      if (problems.length > 0) {
        log.warn(`saved numbering does not fit the network (${problems[0]}); renumbering`);
      }
    }
    return Ok(new NetworkService(projectPath, config, log, built.value, file.name));
  }

  getNetwork(): NodeNetwork {
    return this.network;
  }

  getSummary(): NetworkSummary {
    const nodes = this.network.nodes();
    return {
      name: this.name,
      size: nodes.length,
      tributaryOrder: this.network.tributaryOrder,
      treatDryAsNaturalFlow: this.network.treatDryAsNaturalFlow,
      reaches: new Set(nodes.map((n) => n.reachCounter)).size,
      mostUpstreamId: this.network.getMostUpstreamNode().id,
      counts: this.network.getNodeCounts(),
    };
  }

  getNode(id: string): Result<NodeSnapshot, string> {
    const node = this.network.getNode(id);
    if (!node.ok) return Err(node.error.message);
    return Ok(node.value.toSnapshot());
  }

  /**
   * Nodes in computational order, optionally filtered by type.
   */
  listNodes(filter?: NodeTypeFilter): NodeSnapshot[] {
    const nodes = filter ? this.network.getNodesForType(filter) : this.network.nodes();
    return nodes.map((n) => n.toSnapshot());
  }

  /** One-line listing: "order serial id TYPE reach.position". */
  describeNodes(filter?: NodeTypeFilter): string[] {
    return this.listNodes(filter).map(
      (n) =>
        `${n.computationalOrder} ${n.serial} ${n.id} ${NODE_TYPE_INFO[n.type].abbreviation} ` +
        `${n.reachCounter}.${n.nodeInReachNumber}`
    );
  }

  insertNode(options: InsertNodeOptions): Result<InsertResult, string> {
    return this.commit<InsertResult>(() => {
      const inserted = this.network.insertNode(options);
      if (!inserted.ok) return inserted;
      return Ok({ node: inserted.value.node.toSnapshot(), warnings: inserted.value.warnings });
    });
  }

  deleteNode(id: string): Result<DeleteResult, string> {
    return this.commit<DeleteResult>(
      () => {
        const deleted = this.network.deleteNode(id);
        if (!deleted.ok) return deleted;
        return Ok({ deletedId: deleted.value?.id ?? null, size: this.network.size() });
      },
      (result) => result.deletedId !== null
    );
  }

  renameNode(id: string, newId: string): Result<NodeSnapshot, string> {
    return this.commit<NodeSnapshot>(() => {
      const renamed = this.network.renameNode(id, newId);
      if (!renamed.ok) return renamed;
      return Ok(renamed.value.toSnapshot());
    });
  }

  /**
   * Replace the network with one built from records.
   */
  rebuild(records: readonly NodeRecord[], headFirst: boolean, name?: string): Result<NetworkSummary, string> {
    return this.commit<NetworkSummary>(() => {
      const rebuilt = this.network.rebuild(records, headFirst);
      if (!rebuilt.ok) return rebuilt;
      const converted = this.network.convertLegacyNodeTypes();
      if (converted.length > 0) {
        this.log.info(`converted ${converted.length} legacy node(s) to Other`);
      }
      if (name) this.name = name;
      return Ok(this.getSummary());
    });
  }

  exportRecords(): NodeSnapshot[] {
    return this.network.exportRecords();
  }

  /**
   * One traversal step from a node.
   */
  step(id: string, direction: Direction, position: Position): Result<NodeSnapshot | null, string> {
    return guarded<NodeSnapshot | null>(() => {
      const node = this.network.getNode(id);
      if (!node.ok) return node;
      const next =
        direction === "downstream"
          ? this.network.getDownstreamNode(node.value, position)
          : this.network.getUpstreamNode(node.value, position);
      return Ok(next?.toSnapshot() ?? null);
    });
  }

  /** Ids from one node down to another, inclusive. */
  sequence(fromId: string, toId: string): Result<string[], string> {
    const path = this.network.getNodeSequence(fromId, toId);
    if (!path.ok) return Err(path.error.message);
    return Ok(path.value.map((n) => n.id));
  }

  /**
   * Gage and natural-flow neighbours of a node.
   */
  flowNodes(id: string): Result<FlowNodes, string> {
    return guarded<FlowNodes>(() => {
      const found = this.network.getNode(id);
      if (!found.ok) return found;
      const node = found.value;
      const idOf = (n: StreamNode | null): string | null => n?.id ?? null;
      return Ok({
        id: node.id,
        downstreamGage: idOf(this.network.findDownstreamFlowNode(node)),
        upstreamGages: this.network.findUpstreamFlowNodes(node).map((n) => n.id),
        downstreamNaturalFlowInReach: idOf(this.network.findDownstreamNaturalFlowNodeInReach(node)),
        upstreamNaturalFlowInReach: idOf(this.network.findUpstreamNaturalFlowNodeInReach(node)),
      });
    });
  }

  /**
   * Set coordinates directly. Fails without changes if any id is unknown.
   */
  setLocations(locations: Readonly<Record<string, Point>>): Result<string[], string> {
    const targets: Array<[StreamNode, Point]> = [];
    for (const [id, point] of Object.entries(locations)) {
      const node = this.network.findNode(id);
      if (!node) return Err(`Node not found: ${id}`);
      targets.push([node, point]);
    }
    return this.commit<string[]>(() => {
      for (const [node, point] of targets) node.setLocation(point.x, point.y);
      return Ok(targets.map(([node]) => node.id));
    });
  }

  interpolate(options: InterpolationOptions = {}): Result<InterpolationReport, string> {
    return this.commit<InterpolationReport>(() => Ok(new GeometryInterpolator(this.network).fill(options)));
  }

  validate(): string[] {
    return this.network.validate();
  }

  /**
   * Apply a change and save it. When the save fails the network and its
   * name go back to how they were before the change.
   */
  private commit<T>(change: () => Result<T, Error>, changed: (value: T) => boolean = () => true): Result<T, string> {
    const before = this.network.exportRecords();
    const name = this.name;
    return guarded<T>(() => {
      const result = change();
      if (!result.ok || !changed(result.value)) return result;
      const saved = tryCatch(() => this.save());
      if (!saved.ok) {
        this.restore(before);
        this.name = name;
        return Err(new Error(`Cannot save network: ${saved.error.message}`));
      }
      return result;
    });
  }

  private restore(snapshot: readonly NodeSnapshot[]): void {
    const rebuilt = this.network.rebuild(snapshot, false);
    if (!rebuilt.ok) throw rebuilt.error;
    const problems = this.network.restoreOrdering(snapshot);
    if (problems.length > 0) {
      this.log.warn(`rollback kept recomputed numbering: ${problems[0]}`);
    }
    this.log.warn("change rolled back after a failed save");
  }

  private save(): void {
    saveNetworkFile(this.projectPath, this.config.dataDir, {
      version: NETWORK_FILE_VERSION,
      name: this.name,
      tributaryOrder: this.network.tributaryOrder,
      treatDryAsNaturalFlow: this.network.treatDryAsNaturalFlow,
      nodes: this.network.exportRecords().map((n) => ({
        id: n.id,
        type: n.type,
        description: n.description,
        isNaturalFlow: n.isNaturalFlow,
        isImport: n.isImport,
        isDryRiver: n.isDryRiver,
        x: n.x,
        y: n.y,
        downstreamId: n.downstreamId,
        upstreamIds: n.upstreamIds,
        serial: n.serial,
        reachCounter: n.reachCounter,
        nodeInReachNumber: n.nodeInReachNumber,
      })),
    });
  }
}

/**
 * Stream network: owns the End node and every node reachable from it.
 */

import type { Logger, NetworkError, Result } from "@streamnet/core";
import { Ok, Err, NotFoundError, StructuralError, createLogger, invalidInput } from "@streamnet/core";
import type {
  InsertNodeOptions,
  Limits,
  NodeRecord,
  NodeSnapshot,
  NodeType,
  SavedOrdering,
  StoredNodeRecord,
  NodeTypeFilter,
  Position,
  TributaryOrder,
} from "./model.js";
import { DEFAULT_TRIBUTARY_ORDER, END_NODE_ID } from "./model.js";
import { StreamNode } from "./StreamNode.js";
import type { GraphState } from "./graph.js";
import { idKey } from "./graph.js";
import * as traversal from "./traversal.js";
import type { InsertOutcome } from "./insertion.js";
import { insertNode } from "./insertion.js";
import { deleteNode } from "./deletion.js";
import { buildGraph } from "./rebuild.js";
import * as queries from "./queries.js";
import type { NodeDataKind, NodePredicate, UpstreamSearchOptions } from "./queries.js";

export interface NetworkOptions {
  tributaryOrder?: TributaryOrder;
  /** Count dry-river nodes as natural flow in reach searches */
  treatDryAsNaturalFlow?: boolean;
  logger?: Logger;
}

export interface RebuildOptions extends NetworkOptions {
  /** The End record leads the list (true) or closes it (false) */
  headFirst: boolean;
}

function createHead(): StreamNode {
  const head = new StreamNode({ id: END_NODE_ID, type: "End" });
  head.serial = 1;
  head.computationalOrder = 1;
  head.reachCounter = 1;
  head.nodeInReachNumber = 1;
  head.tributaryNumber = 1;
  return head;
}

export class NodeNetwork {
  readonly tributaryOrder: TributaryOrder;
  treatDryAsNaturalFlow: boolean;
  private readonly state: GraphState;

  constructor(options: NetworkOptions = {}) {
    this.tributaryOrder = options.tributaryOrder ?? DEFAULT_TRIBUTARY_ORDER;
    this.treatDryAsNaturalFlow = options.treatDryAsNaturalFlow ?? false;
    const head = createHead();
    this.state = {
      head,
      arena: new Map([[idKey(head.id), head]]),
      tributaryOrder: this.tributaryOrder,
      log: options.logger ?? createLogger("network"),
    };
  }

  /**
   * Build a network from id-linked records.
   */
  static fromRecords(records: readonly NodeRecord[], options: RebuildOptions): Result<NodeNetwork, StructuralError> {
    const network = new NodeNetwork(options);
    const rebuilt = network.rebuild(records, options.headFirst);
    if (!rebuilt.ok) return rebuilt;
    return Ok(network);
  }

  get head(): StreamNode {
    return this.state.head;
  }

  get log(): Logger {
    return this.state.log;
  }

  size(): number {
    return this.state.arena.size;
  }

  /** All nodes in computational order. */
  nodes(): StreamNode[] {
    return traversal.walkComputational(this.state.head, this.tributaryOrder);
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  insertNode(options: InsertNodeOptions): Result<InsertOutcome, NetworkError> {
    return insertNode(this.state, options);
  }

  deleteNode(id: string): Result<StreamNode | null, NotFoundError> {
    return deleteNode(this.state, id);
  }

  /**
   * Replace the whole graph with one built from records.
   * The current graph survives a failed rebuild unchanged.
   */
  rebuild(records: readonly NodeRecord[], headFirst: boolean): Result<void, StructuralError> {
    try {
      const built = buildGraph(records, headFirst, this.tributaryOrder, this.state.log);
      this.state.head = built.head;
      this.state.arena = built.arena;
      this.state.log.debug(`rebuilt network with ${built.arena.size} nodes`);
      return Ok(undefined);
    } catch (error) {
      if (error instanceof StructuralError) return Err(error);
      throw error;
    }
  }

  /**
   * Put back serial and reach numbers saved with records this network was
   * built from. Saved numbers that fail validate() are discarded and the
   * computed ones kept; the problems are returned.
   */
  restoreOrdering(records: readonly StoredNodeRecord[]): string[] {
    if (records.length !== this.size()) {
      return [`${records.length} saved records for ${this.size()} nodes`];
    }
    const targets: Array<[StreamNode, SavedOrdering]> = [];
    for (const record of records) {
      const { serial, reachCounter, nodeInReachNumber } = record;
      if (serial === undefined || reachCounter === undefined || nodeInReachNumber === undefined) {
        return [`"${record.id}" has no saved ordering`];
      }
      const node = this.findNode(record.id);
      if (!node) return [`no node "${record.id}" for saved ordering`];
      targets.push([node, { serial, reachCounter, nodeInReachNumber }]);
    }

    const computed = targets.map(([node]): [StreamNode, SavedOrdering] => [node, orderingOf(node)]);
    for (const [node, saved] of targets) Object.assign(node, saved);
    const problems = this.validate();
    if (problems.length > 0) {
      for (const [node, ordering] of computed) Object.assign(node, ordering);
    }
    return problems;
  }

  /**
   * Rename a node in place; the new id must be unused.
   */
  renameNode(id: string, newId: string): Result<StreamNode, NetworkError> {
    const node = this.findNode(id);
    if (!node) return Err(new NotFoundError(id));
    const trimmed = newId.trim();
    if (!trimmed) return Err(invalidInput("Node id must not be empty"));
    const existing = this.findNode(trimmed);
    if (existing && existing !== node) return Err(invalidInput(`Node id already in use: ${trimmed}`));
    this.state.arena.delete(idKey(node.id));
    node.id = trimmed;
    this.state.arena.set(idKey(trimmed), node);
    return Ok(node);
  }

  /**
   * Legacy types become Other: Baseflow with the natural-flow flag, Import
   * with the import flag. Returns the converted nodes.
   */
  convertLegacyNodeTypes(): StreamNode[] {
    const converted: StreamNode[] = [];
    for (const node of this.state.arena.values()) {
      if (node.type === "Baseflow") {
        node.type = "Other";
        node.isNaturalFlow = true;
        converted.push(node);
      } else if (node.type === "Import") {
        node.type = "Other";
        node.isImport = true;
        converted.push(node);
      }
    }
    return converted;
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  getDownstreamNode(node: StreamNode, position: Position): StreamNode {
    return traversal.getDownstreamNode(node, position, this.tributaryOrder);
  }

  getUpstreamNode(node: StreamNode, position: Position): StreamNode | null {
    return traversal.getUpstreamNode(node, position, this.tributaryOrder);
  }

  /** The first node of the computational walk. */
  getMostUpstreamNode(): StreamNode {
    return traversal.absoluteUpstream(this.state.head, this.tributaryOrder);
  }

  isMostUpstreamNodeInReach(node: StreamNode): boolean {
    return traversal.nextInReach(node) === null;
  }

  /**
   * Nodes from one node down to another, both included.
   */
  getNodeSequence(fromId: string, toId: string): Result<StreamNode[], NetworkError> {
    const from = this.findNode(fromId);
    if (!from) return Err(new NotFoundError(fromId));
    const to = this.findNode(toId);
    if (!to) return Err(new NotFoundError(toId));

    const path = traversal.pathToHead(from);
    const end = path.indexOf(to);
    if (end < 0) {
      return Err(invalidInput(`"${to.id}" is not downstream of "${from.id}"`));
    }
    return Ok(path.slice(0, end + 1));
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /** Case-insensitive id lookup. */
  findNode(id: string): StreamNode | null {
    return this.state.arena.get(idKey(id)) ?? null;
  }

  getNode(id: string): Result<StreamNode, NotFoundError> {
    const node = this.findNode(id);
    return node ? Ok(node) : Err(new NotFoundError(id));
  }

  findNodeByData(kind: NodeDataKind, nodeType: NodeType, value: string): StreamNode | null {
    return queries.findNodeByData(this.nodes(), kind, nodeType, value);
  }

  getNodesForType(filter: NodeTypeFilter): StreamNode[] {
    return this.nodes().filter((node) => queries.matchesType(node, filter));
  }

  /** Nodes flagged natural flow, in computational order. */
  getBaseflowNodes(): StreamNode[] {
    return this.nodes().filter((node) => node.isNaturalFlow);
  }

  /**
   * Ids of nodes of the given types; structure ids lose their ".suffix".
   */
  getNodeIdentifiersByType(types: readonly NodeType[]): string[] {
    const wanted = new Set(types);
    return this.nodes()
      .filter((node) => wanted.has(node.type))
      .map((node) => queries.baseId(node));
  }

  getNodeCounts(): Partial<Record<NodeType, number>> {
    const counts: Partial<Record<NodeType, number>> = {};
    for (const node of this.state.arena.values()) {
      counts[node.type] = (counts[node.type] ?? 0) + 1;
    }
    return counts;
  }

  findDownstreamFlowNode(node: StreamNode): StreamNode | null {
    return queries.findDownstream(node, queries.isGageNode);
  }

  findDownstreamNaturalFlowNodeInReach(node: StreamNode): StreamNode | null {
    return queries.findDownstreamNaturalFlowNodeInReach(node, this.treatDryAsNaturalFlow);
  }

  findUpstreamNaturalFlowNodeInReach(node: StreamNode): StreamNode | null {
    return queries.findUpstreamNaturalFlowNodeInReach(node, this.treatDryAsNaturalFlow);
  }

  findUpstreamFlowNodes(node: StreamNode, isGage?: NodePredicate): StreamNode[] {
    return queries.findUpstreamFlowNodes(node, isGage);
  }

  findUpstreamNodes(node: StreamNode, options?: UpstreamSearchOptions): StreamNode[] {
    return queries.findUpstreamNodes(node, options);
  }

  findNextRealDownstreamNode(node: StreamNode): StreamNode | null {
    return queries.findDownstream(node, (n) => queries.matchesType(n, "real"));
  }

  findNextXConfluenceDownstreamNode(node: StreamNode): StreamNode | null {
    return queries.findDownstream(node, (n) => n.type === "XConfluence");
  }

  determineExtent(): Limits | null {
    return queries.determineExtent([...this.state.arena.values()]);
  }

  // ==========================================================================
  // Export and checks
  // ==========================================================================

  /**
   * Every node in computational order, adjacency by id. Feeding the result
   * back to fromRecords() with headFirst=false rebuilds the same network.
   */
  exportRecords(): NodeSnapshot[] {
    return this.nodes().map((node) => node.toSnapshot());
  }

  /**
   * Check the structural invariants. Returns one message per violation.
   */
  validate(): string[] {
    const problems: string[] = [];
    let walk: StreamNode[];
    try {
      walk = this.nodes();
    } catch (error) {
      if (error instanceof StructuralError) return [error.message];
      throw error;
    }

    const size = this.size();
    if (walk.length !== size) {
      problems.push(`computational walk reaches ${walk.length} of ${size} nodes`);
    }

    const head = this.state.head;
    if (head.type !== "End") problems.push(`head "${head.id}" is not an End node`);

    const serials = new Set<number>();
    const reachStarts = new Map<number, number>();
    walk.forEach((node, index) => {
      if (node !== head && node.type === "End") problems.push(`extra End node "${node.id}"`);
      if (this.state.arena.get(idKey(node.id)) !== node) problems.push(`"${node.id}" is missing from the id index`);

      if (node.computationalOrder !== index + 1) {
        problems.push(`"${node.id}" has computational order ${node.computationalOrder}, expected ${index + 1}`);
      }
      if (node.serial < 1 || node.serial > size || serials.has(node.serial)) {
        problems.push(`"${node.id}" has serial ${node.serial} outside 1..${size} or reused`);
      }
      serials.add(node.serial);

      const downstream = node.downstream;
      if (downstream) {
        const slots = downstream.upstream.filter((n) => n === node).length;
        if (slots !== 1) {
          problems.push(`"${node.id}" appears ${slots} times upstream of "${downstream.id}"`);
        }
        if (downstream.upstream[node.tributaryNumber - 1] !== node) {
          problems.push(`"${node.id}" has tributary number ${node.tributaryNumber} but a different position`);
        }
        if (downstream.serial >= node.serial) {
          problems.push(`serial does not decrease from "${node.id}" to "${downstream.id}"`);
        }
        const sameReach = downstream.reachCounter === node.reachCounter;
        const expected = sameReach ? downstream.nodeInReachNumber + 1 : 1;
        if (node.nodeInReachNumber !== expected) {
          problems.push(`"${node.id}" is node ${node.nodeInReachNumber} of reach ${node.reachCounter}, expected ${expected}`);
        }
        if (!sameReach) reachStarts.set(node.reachCounter, (reachStarts.get(node.reachCounter) ?? 0) + 1);
      } else if (node !== head) {
        problems.push(`"${node.id}" has no downstream node`);
      } else {
        reachStarts.set(node.reachCounter, (reachStarts.get(node.reachCounter) ?? 0) + 1);
      }
      if (node.upstream.filter((n) => n.reachCounter === node.reachCounter).length > 1) {
        problems.push(`reach ${node.reachCounter} continues on more than one branch above "${node.id}"`);
      }
      for (const upstream of node.upstream) {
        if (upstream.downstream !== node) {
          problems.push(`"${upstream.id}" is upstream of "${node.id}" but drains elsewhere`);
        }
      }
    });

    for (const [reach, starts] of reachStarts) {
      if (starts > 1) problems.push(`reach ${reach} starts on ${starts} separate branches`);
    }
    return problems;
  }
}

function orderingOf(node: StreamNode): SavedOrdering {
  return { serial: node.serial, reachCounter: node.reachCounter, nodeInReachNumber: node.nodeInReachNumber };
}

import { validateEdge } from './edge-validator'
import { GraphError } from './errors'
import type {
	EdgeInput,
	EdgeType,
	GraphEdge,
	GraphEvent,
	GraphNode,
	GraphSnapshot,
	IGraphEventBus,
	NodeInput,
	NodeState,
	NodeType,
} from './types'

export interface GraphStoreOptions {
	/** Defaults to `<appName>-graph`. */
	id?: string
	/** Starting version, 1 for a new graph. */
	version?: number
	createdAt?: Date
	/** Receives every event the graph emits. Can be attached later with `setEventBus`. */
	eventBus?: IGraphEventBus
}

export const NODE_TYPES: readonly NodeType[] = ['spec', 'workflow', 'step', 'resource']

export const NODE_STATES: readonly NodeState[] = ['waiting', 'pending', 'running', 'failed', 'succeeded']

export function isNodeType(value: string): value is NodeType {
	return NODE_TYPES.some((type) => type === value)
}

export function isNodeState(value: string): value is NodeState {
	return NODE_STATES.some((state) => state === value)
}

export function isTerminalState(state: NodeState): boolean {
	return state === 'failed' || state === 'succeeded'
}

function cloneNode(node: GraphNode): GraphNode {
	return { ...node, properties: { ...node.properties } }
}

function cloneEdge(edge: GraphEdge): GraphEdge {
	return { ...edge, properties: { ...edge.properties } }
}

/**
 * Owns the nodes and edges of one application's provisioning graph.
 *
 * Every mutation is validated before anything changes, so a failed call leaves
 * the graph exactly as it was. Node state transitions go through `updateNodeState`,
 * which also applies the two propagation rules between workflows and their steps.
 *
 * A graph assumes a single writer. Nothing here guards against concurrent mutation.
 */
export class GraphStore {
	public readonly id: string
	public readonly appName: string
	public readonly createdAt: Date
	private _version: number
	private _updatedAt: Date
	private readonly nodes = new Map<string, GraphNode>()
	private readonly edges = new Map<string, GraphEdge>()
	private eventBus?: IGraphEventBus

	constructor(appName: string, options: GraphStoreOptions = {}) {
		const now = new Date()
		this.appName = appName
		this.id = options.id ?? `${appName}-graph`
		this._version = options.version ?? 1
		this.createdAt = options.createdAt ?? now
		this._updatedAt = this.createdAt
		this.eventBus = options.eventBus
	}

	/** Incremented on every structural change (node or edge added or removed). */
	get version(): number {
		return this._version
	}

	get updatedAt(): Date {
		return this._updatedAt
	}

	get nodeCount(): number {
		return this.nodes.size
	}

	get edgeCount(): number {
		return this.edges.size
	}

	setEventBus(eventBus: IGraphEventBus | undefined): void {
		this.eventBus = eventBus
	}

	// =================================================================================
	// Mutation
	// =================================================================================

	addNode(input: NodeInput | null | undefined): GraphNode {
		if (!input) {
			throw new GraphError('NodeInvalid', 'node cannot be empty')
		}
		this.checkNode(input)

		const now = new Date()
		const node: GraphNode = {
			id: input.id,
			type: input.type,
			name: input.name,
			description: input.description,
			state: input.state ?? 'waiting',
			properties: { ...input.properties },
			createdAt: now,
			updatedAt: now,
		}
		this.nodes.set(node.id, node)
		this.touch(now, true)

		this.emit({ type: 'node:added', payload: { node } })
		this.emit({ type: 'graph:updated', payload: { graph: this } })
		return node
	}

	addEdge(input: EdgeInput | null | undefined): GraphEdge {
		if (!input) {
			throw new GraphError('EdgeInvalid', 'edge cannot be empty')
		}
		const type = this.checkEdge(input)

		const now = new Date()
		const edge: GraphEdge = {
			id: input.id,
			fromNodeId: input.fromNodeId,
			toNodeId: input.toNodeId,
			type,
			description: input.description,
			properties: { ...input.properties },
			createdAt: now,
		}
		this.edges.set(edge.id, edge)
		this.touch(now, true)

		this.emit({ type: 'edge:added', payload: { edge } })
		this.emit({ type: 'graph:updated', payload: { graph: this } })
		return edge
	}

	/** Removes a node together with every edge that touches it. */
	removeNode(id: string): void {
		const node = this.nodes.get(id)
		if (!node) {
			throw new GraphError('NotFound', `node ${id} does not exist`, { nodeId: id })
		}

		const removedEdges: GraphEdge[] = []
		for (const edge of this.edges.values()) {
			if (edge.fromNodeId === id || edge.toNodeId === id) {
				removedEdges.push(edge)
			}
		}
		for (const edge of removedEdges) {
			this.edges.delete(edge.id)
		}
		this.nodes.delete(id)
		this.touch(new Date(), true)

		this.emit({ type: 'node:removed', payload: { node, removedEdges } })
		this.emit({ type: 'graph:updated', payload: { graph: this } })
	}

	removeEdge(id: string): void {
		const edge = this.edges.get(id)
		if (!edge) {
			throw new GraphError('NotFound', `edge ${id} does not exist`, { edgeId: id })
		}

		this.edges.delete(id)
		this.touch(new Date(), true)

		this.emit({ type: 'edge:removed', payload: { edge } })
		this.emit({ type: 'graph:updated', payload: { graph: this } })
	}

	// =================================================================================
	// Queries
	// =================================================================================

	getNode(id: string): GraphNode | undefined {
		return this.nodes.get(id)
	}

	getEdge(id: string): GraphEdge | undefined {
		return this.edges.get(id)
	}

	hasNode(id: string): boolean {
		return this.nodes.has(id)
	}

	hasEdge(id: string): boolean {
		return this.edges.has(id)
	}

	/** All nodes, in insertion order. */
	getNodes(): GraphNode[] {
		return [...this.nodes.values()]
	}

	/** All edges, in insertion order. */
	getEdges(): GraphEdge[] {
		return [...this.edges.values()]
	}

	getOutgoingEdges(nodeId: string, type?: EdgeType): GraphEdge[] {
		return this.getEdges().filter((e) => e.fromNodeId === nodeId && (type === undefined || e.type === type))
	}

	getIncomingEdges(nodeId: string, type?: EdgeType): GraphEdge[] {
		return this.getEdges().filter((e) => e.toNodeId === nodeId && (type === undefined || e.type === type))
	}

	// No secondary index is kept; both of these scan every node.
	getNodesByType(type: NodeType): GraphNode[] {
		return this.getNodes().filter((n) => n.type === type)
	}

	getNodesByState(state: NodeState): GraphNode[] {
		return this.getNodes().filter((n) => n.state === state)
	}

	/** Targets of `contains` edges sourced at the workflow. */
	getChildSteps(workflowId: string): GraphNode[] {
		const children: GraphNode[] = []
		for (const edge of this.getOutgoingEdges(workflowId, 'contains')) {
			const child = this.nodes.get(edge.toNodeId)
			if (child) {
				children.push(child)
			}
		}
		return children
	}

	/** Source of the `contains` edge targeting the step. */
	getParentWorkflow(stepId: string): GraphNode {
		if (!this.nodes.has(stepId)) {
			throw new GraphError('NotFound', `node ${stepId} does not exist`, { nodeId: stepId })
		}
		const parent = this.findParent(stepId)
		if (!parent) {
			throw new GraphError('NoParent', `step ${stepId} has no parent workflow`, { nodeId: stepId })
		}
		return parent
	}

	// =================================================================================
	// State Machine
	// =================================================================================

	/**
	 * Moves a node to a new state and applies propagation:
	 * - a failed step fails its parent workflow, unless it already failed
	 * - a workflow that fails or succeeds carries its state to every running child step
	 */
	updateNodeState(id: string, newState: NodeState): GraphNode {
		const node = this.nodes.get(id)
		if (!node) {
			throw new GraphError('NotFound', `node ${id} does not exist`, { nodeId: id })
		}

		const oldState = node.state
		const now = new Date()
		this.applyState(node, newState, now)

		if (oldState !== newState) {
			this.emit({ type: 'node:state-change', payload: { node, oldState, newState } })
		}

		if (node.type === 'step' && newState === 'failed') {
			this.propagateStepFailure(node, now)
		}
		if (node.type === 'workflow' && isTerminalState(newState)) {
			this.propagateWorkflowOutcome(node, newState, now)
		}

		this.emit({ type: 'node:updated', payload: { node } })
		return node
	}

	private applyState(node: GraphNode, state: NodeState, now: Date): void {
		node.state = state
		node.updatedAt = now

		if (state === 'running' && !node.startedAt) {
			node.startedAt = now
		}
		if (isTerminalState(state) && !node.completedAt) {
			node.completedAt = now
			if (node.startedAt) {
				node.duration = now.getTime() - node.startedAt.getTime()
			}
		}
	}

	// Propagated changes write the node directly and never go back through
	// updateNodeState, so one transition cannot trigger the other rule.
	private propagateStepFailure(step: GraphNode, now: Date): void {
		const parent = this.findParent(step.id)
		if (!parent || parent.state === 'failed') {
			return
		}
		const oldState = parent.state
		this.applyState(parent, 'failed', now)
		this.emit({
			type: 'node:state-propagated',
			payload: { node: parent, oldState, newState: 'failed', sourceNodeId: step.id },
		})
	}

	private propagateWorkflowOutcome(workflow: GraphNode, state: NodeState, now: Date): void {
		for (const child of this.getChildSteps(workflow.id)) {
			if (child.state !== 'running') continue
			this.applyState(child, state, now)
			this.emit({
				type: 'node:state-propagated',
				payload: { node: child, oldState: 'running', newState: state, sourceNodeId: workflow.id },
			})
		}
	}

	private findParent(stepId: string): GraphNode | undefined {
		const edge = this.getIncomingEdges(stepId, 'contains')[0]
		return edge ? this.nodes.get(edge.fromNodeId) : undefined
	}

	// =================================================================================
	// Validation
	// =================================================================================

	private checkNode(input: NodeInput): void {
		if (!input.id) {
			throw new GraphError('NodeInvalid', 'node ID cannot be empty')
		}
		if (this.nodes.has(input.id)) {
			throw new GraphError('DuplicateID', `node with ID ${input.id} already exists`, { nodeId: input.id })
		}
	}

	private checkEdge(input: EdgeInput): EdgeType {
		if (!input.id) {
			throw new GraphError('EdgeInvalid', 'edge ID cannot be empty')
		}
		if (this.edges.has(input.id)) {
			throw new GraphError('DuplicateID', `edge with ID ${input.id} already exists`, { edgeId: input.id })
		}

		const from = this.nodes.get(input.fromNodeId)
		if (!from) {
			throw new GraphError('DanglingReference', `from node ${input.fromNodeId} does not exist`, {
				edgeId: input.id,
				nodeId: input.fromNodeId,
			})
		}
		const to = this.nodes.get(input.toNodeId)
		if (!to) {
			throw new GraphError('DanglingReference', `to node ${input.toNodeId} does not exist`, {
				edgeId: input.id,
				nodeId: input.toNodeId,
			})
		}

		const type = validateEdge(input.type, from, to, input.id)

		if (type === 'contains') {
			const parent = this.findParent(to.id)
			if (parent) {
				throw new GraphError(
					'EdgeTypeViolation',
					`contains: single parent violated, step ${to.id} already belongs to workflow ${parent.id}`,
					{ edgeId: input.id, nodeId: to.id },
				)
			}
		}

		return type
	}

	// =================================================================================
	// Snapshots
	// =================================================================================

	toSnapshot(): GraphSnapshot {
		return {
			id: this.id,
			appName: this.appName,
			version: this._version,
			nodes: this.getNodes().map(cloneNode),
			edges: this.getEdges().map(cloneEdge),
			createdAt: this.createdAt,
			updatedAt: this._updatedAt,
		}
	}

	/**
	 * Rebuilds a graph from a snapshot. Every node and edge is validated exactly as
	 * `addNode`/`addEdge` would, while states, timings and timestamps are kept.
	 */
	static fromSnapshot(snapshot: GraphSnapshot, options: { eventBus?: IGraphEventBus } = {}): GraphStore {
		const graph = new GraphStore(snapshot.appName, {
			id: snapshot.id,
			version: snapshot.version,
			createdAt: snapshot.createdAt,
		})

		for (const node of snapshot.nodes) {
			graph.checkNode(node)
			graph.nodes.set(node.id, cloneNode(node))
		}
		for (const edge of snapshot.edges) {
			const type = graph.checkEdge(edge)
			graph.edges.set(edge.id, { ...cloneEdge(edge), type })
		}

		graph.touch(snapshot.updatedAt, false)
		graph.eventBus = options.eventBus
		return graph
	}

	private touch(now: Date, structural: boolean): void {
		this._updatedAt = now
		if (structural) {
			this._version++
		}
	}

	private emit(event: GraphEvent): void {
		this.eventBus?.emit(event)
	}
}

import type { GraphStore } from './graph'

// =================================================================================
// Graph Model
// =================================================================================

export type NodeType = 'spec' | 'workflow' | 'step' | 'resource'

export type NodeState = 'waiting' | 'pending' | 'running' | 'failed' | 'succeeded'

export type EdgeType = 'depends-on' | 'provisions' | 'creates' | 'binds-to' | 'contains' | 'configures'

/** Free-form metadata attached to nodes and edges. */
export type Properties = Record<string, unknown>

/** A node as stored in a graph. */
export interface GraphNode {
	readonly id: string
	readonly type: NodeType
	name: string
	description?: string
	state: NodeState
	properties: Properties
	/** Set on the first transition into `running`. */
	startedAt?: Date
	/** Set on the first transition into a terminal state. */
	completedAt?: Date
	/** Milliseconds between `startedAt` and `completedAt`. */
	duration?: number
	createdAt: Date
	updatedAt: Date
}

/** A directed, typed connection between two nodes. */
export interface GraphEdge {
	readonly id: string
	readonly fromNodeId: string
	readonly toNodeId: string
	readonly type: EdgeType
	description?: string
	properties: Properties
	createdAt: Date
}

/** What a caller hands to `GraphStore.addNode`. Timestamps are stamped by the store. */
export interface NodeInput {
	id: string
	type: NodeType
	name: string
	description?: string
	state?: NodeState
	properties?: Properties
}

/**
 * What a caller hands to `GraphStore.addEdge`. The type is checked against the
 * edge rule table, so any string is accepted here.
 */
export interface EdgeInput {
	id: string
	fromNodeId: string
	toNodeId: string
	type: string
	description?: string
	properties?: Properties
}

/** The serializable form of a graph, used by repositories. */
export interface GraphSnapshot {
	id: string
	appName: string
	version: number
	nodes: GraphNode[]
	edges: GraphEdge[]
	createdAt: Date
	updatedAt: Date
}

// =================================================================================
// Events & Observers
// =================================================================================

/** Structured events emitted by a graph as it is mutated. */
export type GraphEvent =
	| { type: 'node:added'; payload: { node: GraphNode } }
	| { type: 'node:removed'; payload: { node: GraphNode; removedEdges: GraphEdge[] } }
	| { type: 'node:state-change'; payload: { node: GraphNode; oldState: NodeState; newState: NodeState } }
	| {
			type: 'node:state-propagated'
			payload: { node: GraphNode; oldState: NodeState; newState: NodeState; sourceNodeId: string }
	  }
	| { type: 'node:updated'; payload: { node: GraphNode } }
	| { type: 'edge:added'; payload: { edge: GraphEdge } }
	| { type: 'edge:removed'; payload: { edge: GraphEdge } }
	| { type: 'graph:updated'; payload: { graph: GraphStore } }

/** Receives every event a graph emits. */
export interface IGraphEventBus {
	emit: (event: GraphEvent) => void
}

/** Notified whenever a node's state changes through `updateNodeState`. */
export interface ExecutionObserver {
	onNodeStateChange(node: GraphNode, oldState: NodeState, newState: NodeState): void
}

/** An observer that may also follow propagation and structural changes. */
export interface GraphObserver extends ExecutionObserver {
	/** A state change applied by a propagation rule rather than a direct update. */
	onNodeStatePropagated?(node: GraphNode, oldState: NodeState, newState: NodeState, sourceNodeId: string): void
	/** Called after every `updateNodeState`, even when the state did not change. */
	onNodeUpdated?(node: GraphNode): void
	onEdgeAdded?(edge: GraphEdge): void
	onGraphUpdated?(graph: GraphStore): void
}

// =================================================================================
// Collaborators
// =================================================================================

/** Interface for a pluggable logger. */
export interface ILogger {
	debug: (message: string, meta?: Record<string, unknown>) => void
	info: (message: string, meta?: Record<string, unknown>) => void
	warn: (message: string, meta?: Record<string, unknown>) => void
	error: (message: string, meta?: Record<string, unknown>) => void
}

export type RunStatus = 'running' | 'completed' | 'failed'

/** The persisted record of one execution attempt of a graph. */
export interface RunRecord {
	id: string
	appName: string
	version: number
	status: RunStatus
	startedAt: Date
	completedAt?: Date
	errorMessage?: string
}

/** Persistence collaborator. Storage layout is entirely up to the implementation. */
export interface Repository {
	loadGraph(appName: string): Promise<GraphStore>
	saveGraph(appName: string, graph: GraphStore): Promise<void>
	/** Creates a run record in the `running` status. */
	createGraphRun(appName: string, version: number): Promise<RunRecord>
	updateGraphRun(runId: string, status: RunStatus, errorMessage?: string): Promise<void>
	/** Runs of an application, newest first. */
	getGraphRuns(appName: string): Promise<RunRecord[]>
}

/** Execution collaborator that performs the actual provisioning work. */
export interface WorkflowRunner {
	runWorkflow(node: GraphNode): Promise<void>
	provisionResource(workflow: GraphNode, resource: GraphNode): Promise<void>
	createResource(workflow: GraphNode, target: GraphNode): Promise<void>
}

import type { GraphNode, RunStatus } from '../types'

export type ExecutionStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped'

/** What happened to one node during one run. */
export interface NodeExecution {
	nodeId: string
	status: ExecutionStatus
	startTime?: Date
	endTime?: Date
	error?: string
	logs: string[]
}

/** The in-memory result of one `executeGraph` call. */
export interface ExecutionPlan {
	runId: string
	appName: string
	/** Graph version the run was planned against. */
	version: number
	status: RunStatus
	startTime: Date
	endTime?: Date
	executions: Map<string, NodeExecution>
	/** Nodes in the order they were walked. */
	order: GraphNode[]
}

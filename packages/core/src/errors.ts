export type GraphErrorKind =
	| 'NodeInvalid'
	| 'EdgeInvalid'
	| 'DuplicateID'
	| 'NotFound'
	| 'DanglingReference'
	| 'EdgeTypeViolation'
	| 'NoParent'
	| 'CycleDetected'
	| 'PersistenceFailure'
	| 'RunnerFailure'

/**
 * A single error class for the graph, planner and engine.
 * The `kind` tells callers what went wrong without parsing the message.
 */
export class GraphError extends Error {
	public readonly kind: GraphErrorKind
	public readonly nodeId?: string
	public readonly edgeId?: string
	public readonly appName?: string
	public readonly runId?: string
	public readonly isFatal: boolean

	constructor(
		kind: GraphErrorKind,
		message: string,
		options: {
			cause?: unknown
			nodeId?: string
			edgeId?: string
			appName?: string
			runId?: string
			isFatal?: boolean
		} = {},
	) {
		super(message, { cause: options.cause })
		this.name = 'GraphError'
		this.kind = kind

		this.nodeId = options.nodeId
		this.edgeId = options.edgeId
		this.appName = options.appName
		this.runId = options.runId
		this.isFatal = options.isFatal ?? false
	}
}

/** Narrows an unknown value to a GraphError, optionally of a specific kind. */
export function isGraphError(error: unknown, kind?: GraphErrorKind): error is GraphError {
	return error instanceof GraphError && (kind === undefined || error.kind === kind)
}

/** Extracts a readable message from anything thrown. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

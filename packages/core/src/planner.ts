import { GraphError } from './errors'
import type { GraphStore } from './graph'
import type { EdgeType, GraphEdge, GraphNode } from './types'

/**
 * Which endpoint of an edge must be scheduled first.
 * - `reverse`: the target runs before the source (the source depends on the target)
 * - `forward`: the source runs before the target (it provisions, contains or configures it)
 */
export type EdgeDirection = 'forward' | 'reverse'

export const EDGE_DIRECTIONS: Readonly<Record<EdgeType, EdgeDirection>> = {
	'depends-on': 'reverse',
	provisions: 'forward',
	creates: 'forward',
	'binds-to': 'forward',
	contains: 'forward',
	configures: 'forward',
}

/** A list of cycles found in the graph. Each cycle starts and ends on the same node ID. */
export type Cycles = string[][]

/** Resolves an edge into the pair (runs first, runs after) under the direction table. */
export function orderingOf(edge: GraphEdge): { before: string; after: string } {
	return EDGE_DIRECTIONS[edge.type] === 'reverse'
		? { before: edge.toNodeId, after: edge.fromNodeId }
		: { before: edge.fromNodeId, after: edge.toNodeId }
}

/** Inserts into an ascending list, keeping it sorted. */
function insertSorted(list: string[], id: string): void {
	let low = 0
	let high = list.length
	while (low < high) {
		const mid = (low + high) >>> 1
		if (list[mid] < id) {
			low = mid + 1
		} else {
			high = mid
		}
	}
	list.splice(low, 0, id)
}

/**
 * Computes execution order over a graph and answers dependency queries.
 * Holds no state of its own; every call reads the graph as it is now.
 */
export class TopologicalPlanner {
	constructor(private readonly graph: GraphStore) {}

	/**
	 * Kahn's algorithm over the direction table. Among nodes that are ready at the
	 * same time, the smallest ID goes first, so the order is stable for a given graph.
	 * @throws GraphError `CycleDetected` when some nodes can never become ready.
	 */
	sort(): GraphNode[] {
		const successors = this.buildSuccessors()
		const inDegree = new Map<string, number>()
		for (const node of this.graph.getNodes()) {
			inDegree.set(node.id, 0)
		}
		for (const targets of successors.values()) {
			for (const target of targets) {
				inDegree.set(target, (inDegree.get(target) ?? 0) + 1)
			}
		}

		const ready: string[] = []
		for (const [id, degree] of inDegree) {
			if (degree === 0) insertSorted(ready, id)
		}

		const result: GraphNode[] = []
		while (ready.length > 0) {
			const id = ready.shift()
			if (id === undefined) break
			const node = this.graph.getNode(id)
			if (node) result.push(node)

			for (const next of successors.get(id) ?? []) {
				const remaining = (inDegree.get(next) ?? 0) - 1
				inDegree.set(next, remaining)
				if (remaining === 0) insertSorted(ready, next)
			}
		}

		if (result.length < this.graph.nodeCount) {
			const cycle = this.findCycles()[0]
			const detail = cycle ? `: ${cycle.join(' -> ')}` : ''
			throw new GraphError('CycleDetected', `graph contains cycles, cannot perform topological sort${detail}`, {
				appName: this.graph.appName,
				isFatal: true,
			})
		}

		return result
	}

	hasCycle(): boolean {
		try {
			this.sort()
			return false
		} catch (error) {
			if (error instanceof GraphError && error.kind === 'CycleDetected') {
				return true
			}
			throw error
		}
	}

	/** Nodes this node depends on: targets of its outgoing `depends-on` edges. */
	getDependencies(id: string): GraphNode[] {
		this.requireNode(id)
		return this.graph
			.getOutgoingEdges(id, 'depends-on')
			.map((edge) => this.graph.getNode(edge.toNodeId))
			.filter((node): node is GraphNode => node !== undefined)
	}

	/** Nodes that depend on this node: sources of its incoming `depends-on` edges. */
	getDependents(id: string): GraphNode[] {
		this.requireNode(id)
		return this.graph
			.getIncomingEdges(id, 'depends-on')
			.map((edge) => this.graph.getNode(edge.fromNodeId))
			.filter((node): node is GraphNode => node !== undefined)
	}

	/**
	 * Finds cycles in the ordering relation with an iterative DFS, which avoids
	 * stack overflows on deep graphs. Nodes are visited in ascending ID order.
	 */
	findCycles(): Cycles {
		const cycles: Cycles = []
		const successors = this.buildSuccessors()
		const ids = this.graph
			.getNodes()
			.map((n) => n.id)
			.sort()

		// 0 = not visited, 1 = visiting, 2 = visited
		const state = new Map<string, number>()
		for (const id of ids) {
			state.set(id, 0)
		}

		for (const start of ids) {
			if (state.get(start) !== 0) continue

			const stack: { node: string; path: string[] }[] = [{ node: start, path: [] }]
			while (stack.length > 0) {
				const frame = stack[stack.length - 1]
				const { node, path } = frame

				if (state.get(node) === 0) {
					state.set(node, 1)
					path.push(node)
				}

				let foundUnvisited = false
				for (const neighbor of successors.get(node) ?? []) {
					const neighborState = state.get(neighbor)
					if (neighborState === 1 && path.includes(neighbor)) {
						const cycle = path.slice(path.indexOf(neighbor))
						const key = [...cycle, neighbor].join('\u0000')
						if (!cycles.some((c) => c.join('\u0000') === key)) {
							cycles.push([...cycle, neighbor])
						}
					} else if (neighborState === 0) {
						stack.push({ node: neighbor, path: [...path] })
						foundUnvisited = true
						break
					}
				}

				if (!foundUnvisited) {
					state.set(node, 2)
					stack.pop()
				}
			}
		}

		return cycles
	}

	private buildSuccessors(): Map<string, string[]> {
		const successors = new Map<string, string[]>()
		for (const edge of this.graph.getEdges()) {
			const { before, after } = orderingOf(edge)
			const list = successors.get(before)
			if (list) {
				list.push(after)
			} else {
				successors.set(before, [after])
			}
		}
		for (const list of successors.values()) {
			list.sort()
		}
		return successors
	}

	private requireNode(id: string): void {
		if (!this.graph.hasNode(id)) {
			throw new GraphError('NotFound', `node ${id} not found`, { nodeId: id })
		}
	}
}

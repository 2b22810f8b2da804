import { GraphError } from './errors'
import type { EdgeType, GraphNode, NodeType } from './types'

/** Endpoint constraint for one edge type. `any` accepts every node type. */
export interface EdgeRule {
	from: NodeType | 'any'
	to: NodeType | 'any'
}

export const EDGE_RULES: Readonly<Record<EdgeType, EdgeRule>> = {
	'depends-on': { from: 'any', to: 'any' },
	provisions: { from: 'workflow', to: 'resource' },
	creates: { from: 'workflow', to: 'any' },
	'binds-to': { from: 'any', to: 'resource' },
	contains: { from: 'workflow', to: 'step' },
	configures: { from: 'step', to: 'resource' },
}

export const EDGE_TYPES: readonly string[] = Object.keys(EDGE_RULES)

export function isEdgeType(type: string): type is EdgeType {
	return Object.hasOwn(EDGE_RULES, type)
}

export function getEdgeRule(type: EdgeType): EdgeRule {
	return EDGE_RULES[type]
}

/**
 * Checks an edge type against the endpoint types it would connect.
 * Throws `EdgeTypeViolation` naming the broken rule; returns the narrowed type otherwise.
 */
export function validateEdge(type: string, from: GraphNode, to: GraphNode, edgeId?: string): EdgeType {
	if (!isEdgeType(type)) {
		throw new GraphError('EdgeTypeViolation', `invalid edge type: ${type}`, { edgeId })
	}

	const rule = EDGE_RULES[type]
	if (rule.from !== 'any' && from.type !== rule.from) {
		throw new GraphError('EdgeTypeViolation', `${type} edge can only originate from ${rule.from} nodes`, {
			edgeId,
			nodeId: from.id,
		})
	}
	if (rule.to !== 'any' && to.type !== rule.to) {
		throw new GraphError('EdgeTypeViolation', `${type} edge can only target ${rule.to} nodes`, {
			edgeId,
			nodeId: to.id,
		})
	}

	return type
}

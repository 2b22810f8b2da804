import { errorMessage, GraphError } from '../errors'
import type { GraphStore } from '../graph'
import { NullLogger } from '../logger'
import { ObserverRegistry } from '../observers'
import { TopologicalPlanner } from '../planner'
import type { GraphNode, ILogger, Repository, RunRecord, WorkflowRunner } from '../types'
import type { ExecutionPlan, NodeExecution } from './types'

/** Configuration options for the ExecutionEngine. */
export interface EngineOptions {
	/** Loads graphs and records runs. */
	repository: Repository
	/** Performs the provisioning side effects of workflow nodes. */
	runner: WorkflowRunner
	/** A pluggable logger for consistent output. */
	logger?: ILogger
	/** Registry attached to every graph the engine executes. A fresh one is created if omitted. */
	observers?: ObserverRegistry
}

/**
 * Executes a stored graph end to end.
 *
 * Nodes run strictly one after another in planned order. A node whose handler fails
 * is recorded as failed and the walk continues; nodes that depend on it through
 * `depends-on` are skipped. Only infrastructure problems (loading the graph, a
 * cycle, creating the run record) reject the returned promise.
 */
export class ExecutionEngine {
	public readonly observers: ObserverRegistry
	private readonly repository: Repository
	private readonly runner: WorkflowRunner
	private readonly logger: ILogger

	constructor(options: EngineOptions) {
		this.repository = options.repository
		this.runner = options.runner
		this.logger = options.logger ?? new NullLogger()
		this.observers = options.observers ?? new ObserverRegistry({ logger: this.logger })
	}

	async executeGraph(appName: string): Promise<ExecutionPlan> {
		let graph: GraphStore
		try {
			graph = await this.repository.loadGraph(appName)
		} catch (error) {
			throw new GraphError('PersistenceFailure', `failed to load graph: ${errorMessage(error)}`, {
				cause: error,
				appName,
				isFatal: true,
			})
		}

		const planner = new TopologicalPlanner(graph)
		const order = planner.sort()

		let run: RunRecord
		try {
			run = await this.repository.createGraphRun(appName, graph.version)
		} catch (error) {
			throw new GraphError('PersistenceFailure', `failed to create graph run: ${errorMessage(error)}`, {
				cause: error,
				appName,
				isFatal: true,
			})
		}

		graph.setEventBus(this.observers)

		const plan: ExecutionPlan = {
			runId: run.id,
			appName,
			version: graph.version,
			status: 'running',
			startTime: new Date(),
			executions: new Map(),
			order,
		}
		for (const node of order) {
			plan.executions.set(node.id, { nodeId: node.id, status: 'pending', logs: [] })
			graph.updateNodeState(node.id, 'pending')
		}

		this.logger.info('Graph run started', { appName, runId: run.id, version: graph.version, nodes: order.length })

		const failedNodeIds: string[] = []
		for (const node of order) {
			const execution = plan.executions.get(node.id)
			if (!execution) continue

			const failedDependency = this.findFailedDependency(planner, node, plan)
			if (failedDependency) {
				execution.status = 'skipped'
				execution.logs.push(`Skipped: dependency ${failedDependency} failed`)
				this.logger.warn('Node skipped', { nodeId: node.id, dependency: failedDependency, runId: run.id })
				continue
			}

			execution.status = 'running'
			execution.startTime = new Date()
			execution.logs.push(`Starting execution of ${node.name} (${node.type})`)
			graph.updateNodeState(node.id, 'running')

			try {
				await this.executeNode(graph, node, execution)
				execution.status = 'completed'
				execution.logs.push('Execution completed successfully')
				graph.updateNodeState(node.id, 'succeeded')
			} catch (error) {
				const failure =
					error instanceof GraphError
						? error
						: new GraphError('RunnerFailure', errorMessage(error), { cause: error, nodeId: node.id })
				execution.status = 'failed'
				execution.error = failure.message
				execution.logs.push(`Execution failed: ${failure.message}`)
				failedNodeIds.push(node.id)
				this.logger.error('Node failed', { nodeId: node.id, runId: run.id, error: failure.message })
				graph.updateNodeState(node.id, 'failed')
			}

			execution.endTime = new Date()
		}

		plan.endTime = new Date()
		plan.status = failedNodeIds.length === 0 ? 'completed' : 'failed'

		try {
			if (plan.status === 'completed') {
				await this.repository.updateGraphRun(run.id, 'completed')
			} else {
				await this.repository.updateGraphRun(run.id, 'failed', `failed nodes: ${failedNodeIds.join(', ')}`)
			}
		} catch (error) {
			this.logger.error('Failed to record final run status', {
				runId: run.id,
				status: plan.status,
				error: errorMessage(error),
			})
		}

		this.logger.info('Graph run finished', { appName, runId: run.id, status: plan.status, failed: failedNodeIds })
		return plan
	}

	/** Run records of an application, newest first. */
	async getRunHistory(appName: string): Promise<RunRecord[]> {
		try {
			return await this.repository.getGraphRuns(appName)
		} catch (error) {
			throw new GraphError('PersistenceFailure', `failed to load graph runs: ${errorMessage(error)}`, {
				cause: error,
				appName,
				isFatal: true,
			})
		}
	}

	// A skipped dependency is not a failed one, so its dependents still run.
	private findFailedDependency(planner: TopologicalPlanner, node: GraphNode, plan: ExecutionPlan): string | undefined {
		for (const dependency of planner.getDependencies(node.id)) {
			if (plan.executions.get(dependency.id)?.status === 'failed') {
				return dependency.id
			}
		}
		return undefined
	}

	private async executeNode(graph: GraphStore, node: GraphNode, execution: NodeExecution): Promise<void> {
		switch (node.type) {
			case 'workflow':
				return this.executeWorkflow(graph, node, execution)
			case 'spec':
				execution.logs.push('Processing spec node...')
				execution.logs.push('Spec validation completed')
				return
			case 'resource':
				return this.executeResource(graph, node, execution)
			case 'step':
				return this.executeStep(graph, node, execution)
			default: {
				const unknownType: never = node.type
				throw new GraphError('RunnerFailure', `unknown node type: ${String(unknownType)}`, { nodeId: node.id })
			}
		}
	}

	private async executeWorkflow(graph: GraphStore, node: GraphNode, execution: NodeExecution): Promise<void> {
		execution.logs.push('Executing workflow...')
		await this.invokeRunner(node, 'workflow execution failed', () => this.runner.runWorkflow(node))

		for (const edge of graph.getOutgoingEdges(node.id)) {
			const target = graph.getNode(edge.toNodeId)
			if (!target) continue

			if (edge.type === 'provisions') {
				execution.logs.push(`Provisioning resource: ${target.name}`)
				await this.invokeRunner(node, 'resource provisioning failed', () =>
					this.runner.provisionResource(node, target),
				)
			} else if (edge.type === 'creates') {
				execution.logs.push(`Creating resource: ${target.name}`)
				await this.invokeRunner(node, 'resource creation failed', () => this.runner.createResource(node, target))
			}
		}

		execution.logs.push('Workflow execution completed')
	}

	private async executeResource(graph: GraphStore, node: GraphNode, execution: NodeExecution): Promise<void> {
		execution.logs.push('Validating resource state...')

		const provisioners = graph
			.getIncomingEdges(node.id)
			.filter((edge) => edge.type === 'provisions' || edge.type === 'creates')
			.map((edge) => edge.fromNodeId)

		if (provisioners.length === 0) {
			execution.logs.push('No provisioners found - resource may be external')
		} else {
			execution.logs.push(`Resource provisioned by ${provisioners.length} workflow(s): ${provisioners.join(', ')}`)
		}

		execution.logs.push('Resource validation completed')
	}

	private async executeStep(graph: GraphStore, node: GraphNode, execution: NodeExecution): Promise<void> {
		const parent = graph.getIncomingEdges(node.id, 'contains')[0]
		execution.logs.push(
			parent ? `Step runs as part of workflow ${parent.fromNodeId}` : 'Step has no parent workflow',
		)
		for (const edge of graph.getOutgoingEdges(node.id, 'configures')) {
			const target = graph.getNode(edge.toNodeId)
			if (target) execution.logs.push(`Configuring resource: ${target.name}`)
		}
	}

	private async invokeRunner(node: GraphNode, context: string, action: () => Promise<void>): Promise<void> {
		try {
			await action()
		} catch (error) {
			throw new GraphError('RunnerFailure', `${context}: ${errorMessage(error)}`, { cause: error, nodeId: node.id })
		}
	}
}

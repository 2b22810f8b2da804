import { describe, expect, it } from 'vitest'
import { GraphStore } from '../src/graph'
import { InMemoryRepository, MockWorkflowRunner } from '../src/testing'
import type { GraphNode } from '../src/types'

describe('InMemoryRepository', () => {
	it('should hand out detached copies of saved graphs', async () => {
		const repository = new InMemoryRepository()
		const graph = new GraphStore('shop')
		graph.addNode({ id: 'wf', type: 'workflow', name: 'deploy' })
		await repository.saveGraph('shop', graph)

		const first = await repository.loadGraph('shop')
		first.updateNodeState('wf', 'failed')
		const second = await repository.loadGraph('shop')

		expect(second.getNode('wf')?.state).toBe('waiting')
		expect(second.version).toBe(graph.version)
	})

	it('should keep run updates and forget everything on clear', async () => {
		const repository = new InMemoryRepository()
		await repository.saveGraph('shop', new GraphStore('shop'))
		const run = await repository.createGraphRun('shop', 1)

		await repository.updateGraphRun(run.id, 'failed', 'failed nodes: wf')
		const [stored] = await repository.getGraphRuns('shop')

		expect(run.status).toBe('running')
		expect(stored?.status).toBe('failed')
		expect(stored?.errorMessage).toBe('failed nodes: wf')

		repository.clear()
		await expect(repository.loadGraph('shop')).rejects.toThrow('app shop not found')
		await expect(repository.updateGraphRun(run.id, 'completed')).rejects.toThrow('run run-1 not found')
	})
})

describe('MockWorkflowRunner', () => {
	const now = new Date()
	const workflow: GraphNode = {
		id: 'wf',
		type: 'workflow',
		name: 'failing-workflow',
		state: 'running',
		properties: {},
		createdAt: now,
		updatedAt: now,
	}
	const resource: GraphNode = { ...workflow, id: 'db', type: 'resource', name: 'postgres' }

	it('should fail the workflow named failing-workflow by default', async () => {
		const runner = new MockWorkflowRunner()

		await expect(runner.runWorkflow(workflow)).rejects.toThrow('mock workflow failure')
		await expect(runner.provisionResource(workflow, resource)).resolves.toBeUndefined()
	})

	it('should fail configured resources and record every call', async () => {
		const runner = new MockWorkflowRunner({ failingWorkflows: [], failingResources: ['postgres'] })

		await runner.runWorkflow(workflow)
		await expect(runner.provisionResource(workflow, resource)).rejects.toThrow('mock provisioning failure for db')
		await expect(runner.createResource(workflow, resource)).rejects.toThrow('mock creation failure for db')

		expect(runner.calls).toEqual([
			{ method: 'runWorkflow', workflowId: 'wf' },
			{ method: 'provisionResource', workflowId: 'wf', targetId: 'db' },
			{ method: 'createResource', workflowId: 'wf', targetId: 'db' },
		])
		runner.clear()
		expect(runner.calls).toEqual([])
	})
})

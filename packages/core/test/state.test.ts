import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { GraphError } from '../src/errors'
import { GraphStore, isTerminalState } from '../src/graph'
import { ObserverRegistry } from '../src/observers'
import { RecordingObserver } from '../src/testing'

describe('State machine', () => {
	let graph: GraphStore
	let recorder: RecordingObserver

	beforeEach(() => {
		graph = new GraphStore('shop')
		graph.addNode({ id: 'wf', type: 'workflow', name: 'deploy' })
		graph.addNode({ id: 's1', type: 'step', name: 'build' })
		graph.addNode({ id: 's2', type: 'step', name: 'push' })
		graph.addNode({ id: 'lonely', type: 'step', name: 'lonely' })
		graph.addEdge({ id: 'c1', fromNodeId: 'wf', toNodeId: 's1', type: 'contains' })
		graph.addEdge({ id: 'c2', fromNodeId: 'wf', toNodeId: 's2', type: 'contains' })

		recorder = new RecordingObserver()
		graph.setEventBus(new ObserverRegistry({ observers: [recorder] }))
	})

	afterEach(() => {
		vi.useRealTimers()
	})

	it('should treat only failed and succeeded as terminal', () => {
		expect(isTerminalState('failed')).toBe(true)
		expect(isTerminalState('succeeded')).toBe(true)
		expect(isTerminalState('running')).toBe(false)
		expect(isTerminalState('pending')).toBe(false)
		expect(isTerminalState('waiting')).toBe(false)
	})

	it('should throw NotFound for unknown nodes', () => {
		expect(() => graph.updateNodeState('ghost', 'running')).toThrow(GraphError)
		expect(() => graph.updateNodeState('ghost', 'running')).toThrow('node ghost does not exist')
	})

	describe('upward propagation', () => {
		it('should fail the parent workflow when a step fails', () => {
			graph.updateNodeState('s1', 'failed')

			expect(graph.getNode('wf')?.state).toBe('failed')
			expect(recorder.transitions).toEqual([{ nodeId: 's1', from: 'waiting', to: 'failed' }])
			expect(recorder.propagated).toEqual([{ nodeId: 'wf', from: 'waiting', to: 'failed', sourceNodeId: 's1' }])
		})

		it('should not touch a parent that has already failed', () => {
			graph.updateNodeState('wf', 'failed')
			recorder.clear()

			graph.updateNodeState('s2', 'failed')

			expect(recorder.transitions).toEqual([{ nodeId: 's2', from: 'waiting', to: 'failed' }])
			expect(recorder.propagated).toEqual([])
		})

		it('should fail a running parent and leave its other steps alone', () => {
			graph.updateNodeState('wf', 'running')
			graph.updateNodeState('s2', 'running')

			graph.updateNodeState('s1', 'failed')

			expect(graph.getNode('wf')?.state).toBe('failed')
			// the parent's failure is written directly, so the downward rule does not fire
			expect(graph.getNode('s2')?.state).toBe('running')
		})

		it('should ignore steps without a parent', () => {
			graph.updateNodeState('lonely', 'failed')

			expect(graph.getNode('lonely')?.state).toBe('failed')
			expect(graph.getNode('wf')?.state).toBe('waiting')
			expect(recorder.propagated).toEqual([])
		})
	})

	describe('downward propagation', () => {
		it('should carry success to running children only', () => {
			graph.updateNodeState('s1', 'running')

			graph.updateNodeState('wf', 'succeeded')

			expect(graph.getNode('s1')?.state).toBe('succeeded')
			expect(graph.getNode('s2')?.state).toBe('waiting')
			expect(recorder.propagated).toEqual([{ nodeId: 's1', from: 'running', to: 'succeeded', sourceNodeId: 'wf' }])
		})

		it('should carry failure to running children without bouncing back', () => {
			graph.updateNodeState('s1', 'running')
			graph.updateNodeState('s2', 'running')

			graph.updateNodeState('wf', 'failed')

			expect(graph.getNode('s1')?.state).toBe('failed')
			expect(graph.getNode('s2')?.state).toBe('failed')
			expect(recorder.propagated).toEqual([
				{ nodeId: 's1', from: 'running', to: 'failed', sourceNodeId: 'wf' },
				{ nodeId: 's2', from: 'running', to: 'failed', sourceNodeId: 'wf' },
			])
			expect(recorder.transitionsOf('wf')).toEqual(['waiting->failed'])
		})

		it('should not propagate when a workflow only starts running', () => {
			graph.updateNodeState('s1', 'running')
			graph.updateNodeState('wf', 'running')

			expect(graph.getNode('s1')?.state).toBe('running')
			expect(recorder.propagated).toEqual([])
		})
	})

	describe('events', () => {
		it('should skip the state-change event when the state is unchanged but still report the update', () => {
			graph.updateNodeState('s1', 'running')
			graph.updateNodeState('s1', 'running')

			expect(recorder.transitionsOf('s1')).toEqual(['waiting->running'])
			expect(recorder.updatedNodeIds).toEqual(['s1', 's1'])
		})

		it('should allow a failed node to run again', () => {
			graph.updateNodeState('lonely', 'failed')
			graph.updateNodeState('lonely', 'running')

			expect(recorder.transitionsOf('lonely')).toEqual(['waiting->failed', 'failed->running'])
		})
	})

	describe('timing', () => {
		it('should stamp start, completion and duration', () => {
			vi.useFakeTimers()
			vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'))
			graph.updateNodeState('lonely', 'running')

			vi.setSystemTime(new Date('2026-03-01T10:00:01.500Z'))
			const node = graph.updateNodeState('lonely', 'succeeded')

			expect(node.startedAt).toEqual(new Date('2026-03-01T10:00:00.000Z'))
			expect(node.completedAt).toEqual(new Date('2026-03-01T10:00:01.500Z'))
			expect(node.updatedAt).toEqual(new Date('2026-03-01T10:00:01.500Z'))
			expect(node.duration).toBe(1500)
		})

		it('should keep the first start and completion times', () => {
			vi.useFakeTimers()
			vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'))
			graph.updateNodeState('lonely', 'running')
			vi.setSystemTime(new Date('2026-03-01T10:00:02.000Z'))
			graph.updateNodeState('lonely', 'failed')

			vi.setSystemTime(new Date('2026-03-01T10:00:05.000Z'))
			graph.updateNodeState('lonely', 'running')
			const node = graph.updateNodeState('lonely', 'succeeded')

			expect(node.startedAt).toEqual(new Date('2026-03-01T10:00:00.000Z'))
			expect(node.completedAt).toEqual(new Date('2026-03-01T10:00:02.000Z'))
			expect(node.duration).toBe(2000)
			expect(node.state).toBe('succeeded')
		})

		it('should leave duration unset when the node never ran', () => {
			const node = graph.updateNodeState('lonely', 'failed')

			expect(node.completedAt).toBeInstanceOf(Date)
			expect(node.startedAt).toBeUndefined()
			expect(node.duration).toBeUndefined()
		})

		it('should time propagated completions', () => {
			vi.useFakeTimers()
			vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'))
			graph.updateNodeState('s1', 'running')

			vi.setSystemTime(new Date('2026-03-01T10:00:03.000Z'))
			graph.updateNodeState('wf', 'succeeded')

			expect(graph.getNode('s1')?.completedAt).toEqual(new Date('2026-03-01T10:00:03.000Z'))
			expect(graph.getNode('s1')?.duration).toBe(3000)
		})
	})
})

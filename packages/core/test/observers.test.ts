import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest'
import { GraphStore } from '../src/graph'
import { ObserverRegistry } from '../src/observers'
import { RecordingObserver } from '../src/testing'
import type { ExecutionObserver, GraphObserver } from '../src/types'

type MockLogger = { debug: Mock; info: Mock; warn: Mock; error: Mock }

function createLogger(): MockLogger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('ObserverRegistry', () => {
	let graph: GraphStore
	let registry: ObserverRegistry
	let logger: MockLogger

	beforeEach(() => {
		logger = createLogger()
		registry = new ObserverRegistry({ logger })
		graph = new GraphStore('shop', { eventBus: registry })
		graph.addNode({ id: 'wf', type: 'workflow', name: 'deploy' })
		graph.addNode({ id: 'step', type: 'step', name: 'migrate' })
		graph.addEdge({ id: 'c1', fromNodeId: 'wf', toNodeId: 'step', type: 'contains' })
	})

	it('should deliver state changes to plain execution observers', () => {
		const seen: string[] = []
		const observer: ExecutionObserver = {
			onNodeStateChange: (node, from, to) => seen.push(`${node.id}:${from}->${to}`),
		}
		registry.addObserver(observer)

		graph.updateNodeState('wf', 'running')
		graph.updateNodeState('wf', 'succeeded')

		expect(seen).toEqual(['wf:waiting->running', 'wf:running->succeeded'])
	})

	it('should deliver the optional graph callbacks', () => {
		const recorder = new RecordingObserver()
		registry.addObserver(recorder)

		graph.addNode({ id: 'db', type: 'resource', name: 'postgres' })
		graph.addEdge({ id: 'p1', fromNodeId: 'wf', toNodeId: 'db', type: 'provisions' })
		graph.updateNodeState('step', 'failed')

		expect(recorder.addedEdgeIds).toEqual(['p1'])
		expect(recorder.graphUpdates).toBe(2)
		expect(recorder.transitions).toEqual([{ nodeId: 'step', from: 'waiting', to: 'failed' }])
		expect(recorder.propagated).toEqual([{ nodeId: 'wf', from: 'waiting', to: 'failed', sourceNodeId: 'step' }])
		expect(recorder.updatedNodeIds).toEqual(['step'])
	})

	it('should log a failing observer and keep delivering to the others', () => {
		const failing: ExecutionObserver = {
			onNodeStateChange: () => {
				throw new Error('observer broke')
			},
		}
		const recorder = new RecordingObserver()
		registry.addObserver(failing)
		registry.addObserver(recorder)

		graph.updateNodeState('wf', 'running')

		expect(recorder.transitionsOf('wf')).toEqual(['waiting->running'])
		expect(logger.error).toHaveBeenCalledTimes(1)
		expect(logger.error).toHaveBeenCalledWith('Observer failed while handling a graph event', {
			event: 'node:state-change',
			error: 'observer broke',
		})
	})

	it('should let an observer unregister another one mid-delivery', () => {
		const second = new RecordingObserver()
		const first: GraphObserver = {
			onNodeStateChange: () => {
				registry.removeObserver(second)
			},
		}
		registry.addObserver(first)
		registry.addObserver(second)

		graph.updateNodeState('wf', 'running')
		graph.updateNodeState('wf', 'succeeded')

		expect(second.transitionsOf('wf')).toEqual(['waiting->running'])
		expect(registry.observerCount).toBe(1)
	})

	it('should not deliver the current event to an observer added mid-delivery', () => {
		const late = new RecordingObserver()
		registry.addObserver({
			onNodeStateChange: () => {
				if (registry.observerCount === 1) registry.addObserver(late)
			},
		})

		graph.updateNodeState('wf', 'running')
		graph.updateNodeState('wf', 'failed')

		expect(late.transitionsOf('wf')).toEqual(['running->failed'])
	})

	it('should register observers passed to the constructor', () => {
		const recorder = new RecordingObserver()
		const withObservers = new ObserverRegistry({ observers: [recorder] })

		expect(withObservers.observerCount).toBe(1)
		expect(withObservers.removeObserver(recorder)).toBe(true)
		expect(withObservers.removeObserver(recorder)).toBe(false)
		expect(withObservers.observerCount).toBe(0)
	})
})

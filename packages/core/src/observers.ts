import { errorMessage } from './errors'
import { NullLogger } from './logger'
import type { ExecutionObserver, GraphEvent, GraphObserver, IGraphEventBus, ILogger } from './types'

/**
 * Fans graph events out to registered observers.
 *
 * Attach a registry to a graph with `graph.setEventBus(registry)`; the graph only
 * emits events and never calls observers itself. Delivery is synchronous and in
 * emission order, so every observer sees a node's transitions in the order they
 * happened. Each dispatch walks a copy of the observer list, which makes it safe
 * to add or remove observers from inside a callback.
 *
 * @example
 * const registry = new ObserverRegistry({ logger: new ConsoleLogger() })
 * registry.addObserver({
 *   onNodeStateChange: (node, from, to) => console.log(`${node.id}: ${from} -> ${to}`),
 * })
 * graph.setEventBus(registry)
 */
export class ObserverRegistry implements IGraphEventBus {
	private observers: GraphObserver[] = []
	private readonly logger: ILogger

	constructor(options: { logger?: ILogger; observers?: ExecutionObserver[] } = {}) {
		this.logger = options.logger ?? new NullLogger()
		for (const observer of options.observers ?? []) {
			this.addObserver(observer)
		}
	}

	addObserver(observer: GraphObserver): void {
		this.observers = [...this.observers, observer]
	}

	/** Removes the first registration of the observer. Returns false if it was not registered. */
	removeObserver(observer: GraphObserver): boolean {
		const index = this.observers.indexOf(observer)
		if (index === -1) {
			return false
		}
		this.observers = [...this.observers.slice(0, index), ...this.observers.slice(index + 1)]
		return true
	}

	get observerCount(): number {
		return this.observers.length
	}

	emit(event: GraphEvent): void {
		const snapshot = this.observers
		for (const observer of snapshot) {
			try {
				this.deliver(observer, event)
			} catch (error) {
				this.logger.error('Observer failed while handling a graph event', {
					event: event.type,
					error: errorMessage(error),
				})
			}
		}
	}

	private deliver(observer: GraphObserver, event: GraphEvent): void {
		switch (event.type) {
			case 'node:state-change':
				observer.onNodeStateChange(event.payload.node, event.payload.oldState, event.payload.newState)
				break
			case 'node:state-propagated':
				observer.onNodeStatePropagated?.(
					event.payload.node,
					event.payload.oldState,
					event.payload.newState,
					event.payload.sourceNodeId,
				)
				break
			case 'node:updated':
				observer.onNodeUpdated?.(event.payload.node)
				break
			case 'edge:added':
				observer.onEdgeAdded?.(event.payload.edge)
				break
			case 'graph:updated':
				observer.onGraphUpdated?.(event.payload.graph)
				break
			default:
				break
		}
	}
}

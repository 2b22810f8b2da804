import { randomUUID } from 'node:crypto'
import Database from 'better-sqlite3'
import {
	GraphStore,
	isEdgeType,
	isNodeState,
	isNodeType,
	NullLogger,
	type GraphEdge,
	type GraphNode,
	type ILogger,
	type Properties,
	type Repository,
	type RunRecord,
	type RunStatus,
} from 'provisioning-graph'

import { type ConfigSources, getRepositoryConfig } from './config'

export * from './config'

export interface SqliteRepositoryOptions {
	/**
	 * Path to the SQLite database file. Use ':memory:' for in-memory database.
	 */
	databasePath: string
	/**
	 * Whether to enable WAL mode for better concurrent access
	 */
	walMode?: boolean
	logger?: ILogger
}

interface AppRow {
	name: string
	graph_id: string
	version: number
	created_at: string
	updated_at: string
}

interface NodeRow {
	id: string
	type: string
	name: string
	description: string | null
	state: string
	properties: string
	started_at: string | null
	completed_at: string | null
	duration: number | null
	created_at: string
	updated_at: string
}

interface EdgeRow {
	id: string
	from_node_id: string
	to_node_id: string
	type: string
	description: string | null
	properties: string
	created_at: string
}

interface RunRow {
	id: string
	app_name: string
	version: number
	status: string
	started_at: string
	completed_at: string | null
	error_message: string | null
}

function isRecord(value: unknown): value is Properties {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseProperties(text: string): Properties {
	const value: unknown = JSON.parse(text)
	return isRecord(value) ? value : {}
}

function isRunStatus(value: string): value is RunStatus {
	return value === 'running' || value === 'completed' || value === 'failed'
}

function optionalDate(value: string | null): Date | undefined {
	return value === null ? undefined : new Date(value)
}

/**
 * SQLite-backed Repository. Stores each application's graph (nodes, edges and
 * their properties as JSON text) together with its run records.
 */
export class SqliteGraphRepository implements Repository {
	private db: Database.Database
	private logger: ILogger

	constructor(options: SqliteRepositoryOptions) {
		this.db = new Database(options.databasePath)
		this.logger = options.logger ?? new NullLogger()

		if (options.walMode !== false) {
			this.db.pragma('journal_mode = WAL')
		}

		this.initializeTables()
	}

	private initializeTables(): void {
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS graph_apps (
				name TEXT PRIMARY KEY,
				graph_id TEXT NOT NULL,
				version INTEGER NOT NULL,
				created_at TEXT NOT NULL,
				updated_at TEXT NOT NULL
			);

			CREATE TABLE IF NOT EXISTS graph_nodes (
				app_name TEXT NOT NULL REFERENCES graph_apps(name) ON DELETE CASCADE,
				id TEXT NOT NULL,
				position INTEGER NOT NULL,
				type TEXT NOT NULL,
				name TEXT NOT NULL,
				description TEXT,
				state TEXT NOT NULL DEFAULT 'waiting',
				properties TEXT NOT NULL DEFAULT '{}',
				started_at TEXT,
				completed_at TEXT,
				duration INTEGER,
				created_at TEXT NOT NULL,
				updated_at TEXT NOT NULL,
				PRIMARY KEY (app_name, id)
			);

			CREATE TABLE IF NOT EXISTS graph_edges (
				app_name TEXT NOT NULL REFERENCES graph_apps(name) ON DELETE CASCADE,
				id TEXT NOT NULL,
				position INTEGER NOT NULL,
				from_node_id TEXT NOT NULL,
				to_node_id TEXT NOT NULL,
				type TEXT NOT NULL,
				description TEXT,
				properties TEXT NOT NULL DEFAULT '{}',
				created_at TEXT NOT NULL,
				PRIMARY KEY (app_name, id)
			);

			CREATE TABLE IF NOT EXISTS graph_runs (
				id TEXT PRIMARY KEY,
				app_name TEXT NOT NULL REFERENCES graph_apps(name) ON DELETE CASCADE,
				version INTEGER NOT NULL,
				status TEXT NOT NULL,
				started_at TEXT NOT NULL,
				completed_at TEXT,
				error_message TEXT
			);
		`)

		this.db.exec(`
			CREATE INDEX IF NOT EXISTS idx_graph_nodes_state ON graph_nodes(app_name, state);
			CREATE INDEX IF NOT EXISTS idx_graph_edges_type ON graph_edges(app_name, type);
			CREATE INDEX IF NOT EXISTS idx_graph_runs_app ON graph_runs(app_name);
		`)
	}

	/** Replaces everything stored for the application with the graph's current contents. */
	async saveGraph(appName: string, graph: GraphStore): Promise<void> {
		const snapshot = graph.toSnapshot()

		const upsertApp = this.db.prepare<[string, string, number, string, string]>(`
			INSERT INTO graph_apps (name, graph_id, version, created_at, updated_at)
			VALUES (?, ?, ?, ?, ?)
			ON CONFLICT(name) DO UPDATE SET
				graph_id = excluded.graph_id,
				version = excluded.version,
				updated_at = excluded.updated_at
		`)
		const insertNode = this.db.prepare(`
			INSERT INTO graph_nodes (
				app_name, id, position, type, name, description, state, properties,
				started_at, completed_at, duration, created_at, updated_at
			) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
		`)
		const insertEdge = this.db.prepare(`
			INSERT INTO graph_edges (
				app_name, id, position, from_node_id, to_node_id, type, description, properties, created_at
			) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
		`)

		const save = this.db.transaction(() => {
			upsertApp.run(
				appName,
				snapshot.id,
				snapshot.version,
				snapshot.createdAt.toISOString(),
				snapshot.updatedAt.toISOString(),
			)
			this.db.prepare('DELETE FROM graph_edges WHERE app_name = ?').run(appName)
			this.db.prepare('DELETE FROM graph_nodes WHERE app_name = ?').run(appName)

			snapshot.nodes.forEach((node, position) => {
				insertNode.run(
					appName,
					node.id,
					position,
					node.type,
					node.name,
					node.description ?? null,
					node.state,
					JSON.stringify(node.properties),
					node.startedAt?.toISOString() ?? null,
					node.completedAt?.toISOString() ?? null,
					node.duration ?? null,
					node.createdAt.toISOString(),
					node.updatedAt.toISOString(),
				)
			})
			snapshot.edges.forEach((edge, position) => {
				insertEdge.run(
					appName,
					edge.id,
					position,
					edge.fromNodeId,
					edge.toNodeId,
					edge.type,
					edge.description ?? null,
					JSON.stringify(edge.properties),
					edge.createdAt.toISOString(),
				)
			})
		})
		save()

		this.logger.debug('Graph saved', { appName, nodes: snapshot.nodes.length, edges: snapshot.edges.length })
	}

	async loadGraph(appName: string): Promise<GraphStore> {
		const app = this.findApp(appName)
		if (!app) {
			throw new Error(`app ${appName} not found`)
		}

		const nodeRows = this.db
			.prepare<[string], NodeRow>(`
				SELECT id, type, name, description, state, properties, started_at, completed_at, duration, created_at, updated_at
				FROM graph_nodes
				WHERE app_name = ?
				ORDER BY position ASC
			`)
			.all(appName)
		const edgeRows = this.db
			.prepare<[string], EdgeRow>(`
				SELECT id, from_node_id, to_node_id, type, description, properties, created_at
				FROM graph_edges
				WHERE app_name = ?
				ORDER BY position ASC
			`)
			.all(appName)

		return GraphStore.fromSnapshot({
			id: app.graph_id,
			appName,
			version: app.version,
			nodes: nodeRows.map((row) => this.rowToNode(row)),
			edges: edgeRows.map((row) => this.rowToEdge(row)),
			createdAt: new Date(app.created_at),
			updatedAt: new Date(app.updated_at),
		})
	}

	async createGraphRun(appName: string, version: number): Promise<RunRecord> {
		if (!this.findApp(appName)) {
			throw new Error(`app ${appName} not found`)
		}

		const run: RunRecord = {
			id: randomUUID(),
			appName,
			version,
			status: 'running',
			startedAt: new Date(),
		}
		this.db
			.prepare<[string, string, number, string, string]>(
				'INSERT INTO graph_runs (id, app_name, version, status, started_at) VALUES (?, ?, ?, ?, ?)',
			)
			.run(run.id, run.appName, run.version, run.status, run.startedAt.toISOString())
		return run
	}

	async updateGraphRun(runId: string, status: RunStatus, errorMessage?: string): Promise<void> {
		const completedAt = status === 'completed' || status === 'failed' ? new Date().toISOString() : null
		const result = this.db
			.prepare<[string, string | null, string | null, string]>(`
				UPDATE graph_runs
				SET status = ?, completed_at = COALESCE(?, completed_at), error_message = COALESCE(?, error_message)
				WHERE id = ?
			`)
			.run(status, completedAt, errorMessage ?? null, runId)

		if (result.changes === 0) {
			throw new Error(`run ${runId} not found`)
		}
	}

	async getGraphRuns(appName: string): Promise<RunRecord[]> {
		if (!this.findApp(appName)) {
			throw new Error(`app ${appName} not found`)
		}

		const rows = this.db
			.prepare<[string], RunRow>(`
				SELECT id, app_name, version, status, started_at, completed_at, error_message
				FROM graph_runs
				WHERE app_name = ?
				ORDER BY started_at DESC, rowid DESC
			`)
			.all(appName)

		return rows.map((row) => this.rowToRun(row))
	}

	/**
	 * Close the database connection.
	 */
	close(): void {
		this.db.close()
	}

	/**
	 * Clear all graphs and runs from the database (useful for testing).
	 */
	clear(): void {
		this.db.exec('DELETE FROM graph_runs; DELETE FROM graph_edges; DELETE FROM graph_nodes; DELETE FROM graph_apps;')
	}

	/**
	 * Get database statistics.
	 */
	getStats(): { apps: number; nodes: number; edges: number; runs: number } {
		const count = (table: string): number =>
			this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0

		return {
			apps: count('graph_apps'),
			nodes: count('graph_nodes'),
			edges: count('graph_edges'),
			runs: count('graph_runs'),
		}
	}

	private findApp(appName: string): AppRow | undefined {
		return this.db
			.prepare<[string], AppRow>('SELECT name, graph_id, version, created_at, updated_at FROM graph_apps WHERE name = ?')
			.get(appName)
	}

	private rowToNode(row: NodeRow): GraphNode {
		if (!isNodeType(row.type)) {
			throw new Error(`node ${row.id} has unknown type ${row.type}`)
		}
		if (!isNodeState(row.state)) {
			throw new Error(`node ${row.id} has unknown state ${row.state}`)
		}
		return {
			id: row.id,
			type: row.type,
			name: row.name,
			description: row.description ?? undefined,
			state: row.state,
			properties: parseProperties(row.properties),
			startedAt: optionalDate(row.started_at),
			completedAt: optionalDate(row.completed_at),
			duration: row.duration ?? undefined,
			createdAt: new Date(row.created_at),
			updatedAt: new Date(row.updated_at),
		}
	}

	private rowToEdge(row: EdgeRow): GraphEdge {
		if (!isEdgeType(row.type)) {
			throw new Error(`edge ${row.id} has unknown type ${row.type}`)
		}
		return {
			id: row.id,
			fromNodeId: row.from_node_id,
			toNodeId: row.to_node_id,
			type: row.type,
			description: row.description ?? undefined,
			properties: parseProperties(row.properties),
			createdAt: new Date(row.created_at),
		}
	}

	private rowToRun(row: RunRow): RunRecord {
		if (!isRunStatus(row.status)) {
			throw new Error(`run ${row.id} has unknown status ${row.status}`)
		}
		return {
			id: row.id,
			appName: row.app_name,
			version: row.version,
			status: row.status,
			startedAt: new Date(row.started_at),
			completedAt: optionalDate(row.completed_at),
			errorMessage: row.error_message ?? undefined,
		}
	}
}

/**
 * Opens the repository described by the environment or a config file.
 * Throws when neither names a database.
 */
export function createRepositoryFromConfig(
	options: { logger?: ILogger; sources?: ConfigSources } = {},
): SqliteGraphRepository {
	const config = getRepositoryConfig(options.sources)
	if (!config) {
		throw new Error(
			'no repository configured: set PROVISIONING_GRAPH_SQLITE_PATH or add a repository section to a config file',
		)
	}
	return new SqliteGraphRepository({ ...config, logger: options.logger })
}

import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

export interface RepositoryConfig {
	databasePath: string
	walMode?: boolean
}

export interface ConfigFile {
	repository?: RepositoryConfig
}

export interface ConfigSources {
	env?: NodeJS.ProcessEnv
	cwd?: string
	homeDir?: string
}

function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseConfigFile(content: string, path: string): ConfigFile {
	let parsed: unknown
	try {
		parsed = JSON.parse(content)
	} catch (error) {
		throw new Error(`invalid config file ${path}`, { cause: error })
	}
	if (!isObject(parsed)) {
		throw new Error(`invalid config file ${path}: expected an object`)
	}

	const repository = parsed.repository
	if (repository === undefined) {
		return {}
	}
	if (!isObject(repository) || typeof repository.databasePath !== 'string') {
		throw new Error(`invalid config file ${path}: repository.databasePath must be a string`)
	}
	if (repository.walMode !== undefined && typeof repository.walMode !== 'boolean') {
		throw new Error(`invalid config file ${path}: repository.walMode must be a boolean`)
	}
	return { repository: { databasePath: repository.databasePath, walMode: repository.walMode } }
}

/** Candidate config files, most specific first. */
export function configFilePaths(sources: ConfigSources = {}): string[] {
	const env = sources.env ?? process.env
	const paths = [
		join(sources.cwd ?? process.cwd(), '.provisioning-graph.json'),
		join(sources.homeDir ?? homedir(), '.provisioning-graph', 'config.json'),
	]
	return env.PROVISIONING_GRAPH_CONFIG ? [env.PROVISIONING_GRAPH_CONFIG, ...paths] : paths
}

export function loadConfig(sources: ConfigSources = {}): ConfigFile | null {
	for (const configPath of configFilePaths(sources)) {
		if (existsSync(configPath)) {
			return parseConfigFile(readFileSync(configPath, 'utf-8'), configPath)
		}
	}
	return null
}

/**
 * Resolves repository settings. `PROVISIONING_GRAPH_SQLITE_PATH` wins over any
 * config file; `PROVISIONING_GRAPH_WAL=false` turns WAL mode off.
 */
export function getRepositoryConfig(sources: ConfigSources = {}): RepositoryConfig | null {
	const env = sources.env ?? process.env

	if (env.PROVISIONING_GRAPH_SQLITE_PATH) {
		return {
			databasePath: env.PROVISIONING_GRAPH_SQLITE_PATH,
			walMode: env.PROVISIONING_GRAPH_WAL !== 'false',
		}
	}

	const config = loadConfig(sources)
	return config?.repository ?? null
}

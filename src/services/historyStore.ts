import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

import Database from "better-sqlite3";
import { z } from "zod";

import type { MetricCategory, MetricRecord } from "../types";

const HISTORY_SCHEMA_VERSION = 1;
export const DEFAULT_HISTORY_DB_FILE = "data/history.db";
export const MAX_HISTORY_HOURS = 720;

export interface HistoryPoint {
	timestamp: number;
	values: Record<string, number>;
}

export interface HistoryStoreOptions {
	path: string;
	snapshotIntervalMs: number;
	now?: () => number;
}

export interface HistoryStore {
	/** Returns true when a snapshot was written. */
	record(record: MetricRecord): boolean;
	query(category: MetricCategory, hours: number): HistoryPoint[];
	close(): void;
}

interface SnapshotRow {
	timestamp: number;
	payload: string;
}

const payloadSchema = z.record(z.number());

export const clampHours = (hours: number): number =>
	Number.isFinite(hours) ? Math.min(MAX_HISTORY_HOURS, Math.max(1, hours)) : 24;

const openDatabase = (path: string): Database.Database => {
	if (path !== ":memory:") {
		mkdirSync(dirname(path), { recursive: true });
	}
	const db = new Database(path);
	if (path !== ":memory:") {
		db.pragma("journal_mode = WAL");
	}
	db.exec(
		"CREATE TABLE IF NOT EXISTS metric_snapshots (category TEXT NOT NULL, timestamp INTEGER NOT NULL, payload TEXT NOT NULL, PRIMARY KEY (category, timestamp));"
	);
	db.exec(
		"CREATE TABLE IF NOT EXISTS history_meta (key TEXT PRIMARY KEY, value TEXT NOT NULL);"
	);
	const row = db
		.prepare<[string], { value: string }>("SELECT value FROM history_meta WHERE key = ?")
		.get("schemaVersion");
	const currentVersion = row ? Number(row.value) : null;
	if (currentVersion !== HISTORY_SCHEMA_VERSION) {
		db.exec("DELETE FROM metric_snapshots;");
		db.prepare("INSERT OR REPLACE INTO history_meta (key, value) VALUES (?, ?)")
			.run("schemaVersion", String(HISTORY_SCHEMA_VERSION));
	}
	return db;
};

// Only values observed live this refresh are history; carried-over values are not.
const liveNumericValues = (record: MetricRecord): Record<string, number> => {
	const values: Record<string, number> = {};
	for (const [field, value] of Object.entries(record.fields)) {
		if (
			typeof value === "number" &&
			Number.isFinite(value) &&
			record.freshness[field]?.source === "live"
		) {
			values[field] = value;
		}
	}
	return values;
};

export function createHistoryStore(options: HistoryStoreOptions): HistoryStore {
	const now = options.now ?? Date.now;
	const db = openDatabase(options.path || DEFAULT_HISTORY_DB_FILE);
	const lastWritten = new Map<MetricCategory, number>();

	const insert = db.prepare<[string, number, string]>(
		"INSERT OR REPLACE INTO metric_snapshots (category, timestamp, payload) VALUES (?, ?, ?)"
	);
	const select = db.prepare<[string, number], SnapshotRow>(
		"SELECT timestamp, payload FROM metric_snapshots WHERE category = ? AND timestamp >= ? ORDER BY timestamp ASC"
	);

	const record = (snapshot: MetricRecord): boolean => {
		const nowMs = now();
		const last = lastWritten.get(snapshot.category);
		if (last !== undefined && nowMs - last < options.snapshotIntervalMs) {
			return false;
		}
		const values = liveNumericValues(snapshot);
		if (Object.keys(values).length === 0) {
			return false;
		}
		insert.run(snapshot.category, nowMs, JSON.stringify(values));
		lastWritten.set(snapshot.category, nowMs);
		return true;
	};

	const query = (category: MetricCategory, hours: number): HistoryPoint[] => {
		const cutoff = now() - clampHours(hours) * 60 * 60 * 1000;
		return select.all(category, cutoff).flatMap((row) => {
			const parsed = payloadSchema.safeParse(JSON.parse(row.payload));
			return parsed.success ? [{ timestamp: row.timestamp, values: parsed.data }] : [];
		});
	};

	return {
		record,
		query,
		close: () => {
			db.close();
		},
	};
}

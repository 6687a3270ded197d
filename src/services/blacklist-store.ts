import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { type Either, isLeft, left, right } from "../lib/either.js";
import { describeError } from "../utils/errors.js";
import { createKeyedLock } from "../utils/keyed-lock.js";

export const BLACKLIST_FILE_NAME = "blacklist.json";

const BlacklistFileSchema = z.array(
	z.union([z.string(), z.number().finite().transform((id) => String(id))]),
);

export class BlacklistStoreError extends Error {
	constructor(
		message: string,
		readonly groupId: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "BlacklistStoreError";
	}
}

/**
 * Configuration for the file-backed blacklist store
 */
export interface BlacklistStoreConfig {
	dataRoot: string;
	debugPrefix?: string;
}

/**
 * Per-group blacklist persisted as one JSON file per group
 */
export interface BlacklistStore {
	load: (groupId: string) => Promise<Set<string>>;
	save: (
		groupId: string,
		members: Iterable<string>,
	) => Promise<Either<BlacklistStoreError, string[]>>;
	addMember: (groupId: string, userId: string) => Promise<boolean>;
	contains: (groupId: string, userId: string) => Promise<boolean>;
	listMembers: (groupId: string) => Promise<string[]>;
	pathFor: (groupId: string) => string;
}

/**
 * Group ids become a directory name, so they must be a single path segment
 */
export const isSafeGroupId = (groupId: string): boolean => {
	if (groupId.length === 0 || groupId === "." || groupId === "..") {
		return false;
	}
	return !/[\\/\0]/.test(groupId);
};

const isNotFoundError = (error: unknown): boolean => {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
};

const parseBlacklistFile = (content: string): Either<Error, string[]> => {
	let document: unknown;
	try {
		document = JSON.parse(content);
	} catch (error) {
		return left(new Error(`Invalid JSON: ${describeError(error)}`));
	}

	const parsed = BlacklistFileSchema.safeParse(document);
	if (!parsed.success) {
		return left(new Error("Expected a JSON array of user ids"));
	}
	return right(parsed.data);
};

/**
 * Creates the file-backed blacklist store
 * Every read-modify-write runs under a per-group lock, and every write replaces
 * the whole file through a temporary file and a rename.
 *
 * @example
 * ```ts
 * const store = createBlacklistStore({ dataRoot: "data/plugins/group-leave-guard" });
 * await store.addMember("123456", "10001"); // true
 * await store.addMember("123456", "10001"); // false
 * await store.contains("123456", "10001"); // true
 * ```
 */
export function createBlacklistStore(config: BlacklistStoreConfig): BlacklistStore {
	const debugPrefix = config.debugPrefix ?? "blacklist-store";
	const lock = createKeyedLock();

	const pathFor = (groupId: string): string => {
		return join(config.dataRoot, groupId, BLACKLIST_FILE_NAME);
	};

	const load = async (groupId: string): Promise<Set<string>> => {
		if (!isSafeGroupId(groupId)) {
			console.warn(`[WARN] ${debugPrefix}: Refusing to read blacklist for unsafe group id`, {
				groupId,
			});
			return new Set();
		}

		const path = pathFor(groupId);
		let content: string;
		try {
			content = await readFile(path, "utf8");
		} catch (error) {
			if (!isNotFoundError(error)) {
				console.error(`[ERROR] ${debugPrefix}: Failed to read blacklist`, { groupId, path }, error);
			}
			return new Set();
		}

		const parsed = parseBlacklistFile(content);
		if (isLeft(parsed)) {
			console.error(`[ERROR] ${debugPrefix}: Unreadable blacklist file, treating as empty`, {
				groupId,
				path,
				reason: parsed[0].message,
			});
			return new Set();
		}
		return new Set(parsed[1]);
	};

	const writeMembers = async (
		groupId: string,
		members: Iterable<string>,
	): Promise<Either<BlacklistStoreError, string[]>> => {
		if (!isSafeGroupId(groupId)) {
			return left(new BlacklistStoreError(`Unsafe group id: "${groupId}"`, groupId));
		}

		const path = pathFor(groupId);
		const sorted = [...new Set(members)].sort();
		const tempPath = `${path}.${randomUUID()}.tmp`;

		try {
			await mkdir(dirname(path), { recursive: true });
			await writeFile(tempPath, `${JSON.stringify(sorted, null, 2)}\n`, "utf8");
			await rename(tempPath, path);
		} catch (error) {
			await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
				console.error(`[ERROR] ${debugPrefix}: Failed to remove temporary file`, { tempPath }, cleanupError);
			});
			return left(
				new BlacklistStoreError(`Failed to write blacklist for group ${groupId}: ${describeError(error)}`, groupId, {
					cause: error,
				}),
			);
		}

		console.log(`[DEBUG] ${debugPrefix}: Blacklist saved`, {
			groupId,
			count: sorted.length,
		});
		return right(sorted);
	};

	const save = (
		groupId: string,
		members: Iterable<string>,
	): Promise<Either<BlacklistStoreError, string[]>> => {
		// Snapshot before queueing so later caller mutations do not leak in
		const snapshot = [...members];
		return lock.run(groupId, () => writeMembers(groupId, snapshot));
	};

	const addMember = (groupId: string, userId: string): Promise<boolean> => {
		if (!isSafeGroupId(groupId)) {
			console.warn(`[WARN] ${debugPrefix}: Refusing to blacklist member for unsafe group id`, { groupId, userId });
			return Promise.resolve(false);
		}

		return lock.run(groupId, async () => {
			const members = await load(groupId);
			if (members.has(userId)) {
				console.log(`[DEBUG] ${debugPrefix}: Member already blacklisted`, { groupId, userId });
				return false;
			}

			members.add(userId);
			const saved = await writeMembers(groupId, members);
			if (isLeft(saved)) {
				console.error(`[ERROR] ${debugPrefix}: Member added in memory but not persisted`, { groupId, userId }, saved[0]);
			} else {
				console.log(`[DEBUG] ${debugPrefix}: Member added to blacklist`, { groupId, userId });
			}
			return true;
		});
	};

	const contains = async (groupId: string, userId: string): Promise<boolean> => {
		const members = await load(groupId);
		return members.has(userId);
	};

	const listMembers = async (groupId: string): Promise<string[]> => {
		const members = await load(groupId);
		return [...members].sort();
	};

	return {
		load,
		save,
		addMember,
		contains,
		listMembers,
		pathFor,
	};
}

import { Ajv, type ValidateFunction } from 'ajv';
import { StoreCorruptError, errorMessage } from '../../errors/src/index.js';
import { logDebug } from '../../logging/src/index.js';
import { atomicWriteJson, readJsonMaybe } from '../../state/src/atomic-json.js';
import { withFileLock, type FileLockOptions } from '../../state/src/file-lock.js';
import { storeSchema, userRecordSchema } from './schema.js';
import { emptyStore, totalCount, type Store, type UserRecord } from './types.js';

let validateFn: ValidateFunction<Store> | null = null;

function storeValidator(): ValidateFunction<Store> {
  if (validateFn) return validateFn;
  const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
  ajv.addSchema(userRecordSchema);
  validateFn = ajv.compile<Store>(storeSchema);
  return validateFn;
}

function checkRecordInvariants(key: string, record: UserRecord): string | null {
  if (record.userId !== key) return `users.${key}: userId is ${record.userId}`;
  if (totalCount(record.counts) !== record.seenEventIds.length) {
    return `users.${key}: counts do not add up to ${record.seenEventIds.length} seen events`;
  }
  return null;
}

/**
 * Validates a parsed snapshot. Throws StoreCorruptError when the value does
 * not match the schema or breaks the per-record invariants.
 */
export function parseStore(value: unknown, source = '<memory>'): Store {
  const validate = storeValidator();
  if (!validate(value)) {
    const details = (validate.errors || []).map((e) => `${e.instancePath || '/'} ${e.message || 'invalid'}`);
    throw new StoreCorruptError(`store snapshot ${source} is invalid: ${details.join('; ')}`, { source, details });
  }
  for (const [key, record] of Object.entries(value.users)) {
    const problem = checkRecordInvariants(key, record);
    if (problem) throw new StoreCorruptError(`store snapshot ${source} is invalid: ${problem}`, { source });
  }
  return value;
}

/** Reads the snapshot at `storePath`; a missing file is an empty store. */
export async function load(storePath: string): Promise<Store> {
  let raw: unknown;
  try {
    raw = await readJsonMaybe(storePath);
  } catch (err) {
    throw new StoreCorruptError(`cannot read store ${storePath}: ${errorMessage(err)}`, { storePath }, { cause: err });
  }
  if (raw === null) {
    logDebug('record-store', 'load:missing', { storePath });
    return emptyStore();
  }
  const store = parseStore(raw, storePath);
  logDebug('record-store', 'load', { storePath, users: Object.keys(store.users).length });
  return store;
}

function sortedSnapshot(store: Store): Store {
  const users = Object.entries(store.users).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return { version: store.version, users: Object.fromEntries(users) };
}

/** Replaces the snapshot at `storePath` atomically (temp file + rename). */
export async function save(storePath: string, store: Store): Promise<void> {
  await atomicWriteJson(storePath, sortedSnapshot(store));
  logDebug('record-store', 'save', { storePath, users: Object.keys(store.users).length });
}

/**
 * Runs `fn` while holding `<storePath>.lock`, so a load → merge → save
 * sequence in one process cannot interleave with another process's.
 */
export function withStoreLock<T>(storePath: string, fn: () => Promise<T>, options?: FileLockOptions): Promise<T> {
  return withFileLock(storePath, fn, options);
}

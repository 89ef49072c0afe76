import type { DocumentComparison } from "@/types/comparison";

const GLOBAL_KEY = "__sentenceDiffComparisonStore__";

type StoredComparison = {
  result: DocumentComparison;
  expiresAtMs: number;
};

export type StoredComparisonState =
  | { state: "ok"; record: StoredComparison }
  | { state: "expired" }
  | { state: "missing" };

type ComparisonStore = Map<string, StoredComparison>;

type StoreContainer = {
  [GLOBAL_KEY]?: ComparisonStore;
};

// Route handlers can be loaded as separate module instances in dev, so the
// map hangs off globalThis.
const globalContainer: typeof globalThis & StoreContainer = globalThis;

const getStore = (): ComparisonStore => {
  const existing = globalContainer[GLOBAL_KEY];
  if (existing) {
    return existing;
  }

  const created: ComparisonStore = new Map();
  globalContainer[GLOBAL_KEY] = created;
  return created;
};

const isExpired = (record: StoredComparison, now: number): boolean => now >= record.expiresAtMs;

export const purgeExpiredComparisons = (now = Date.now()): void => {
  const store = getStore();
  for (const [id, record] of store.entries()) {
    if (isExpired(record, now)) {
      store.delete(id);
    }
  }
};

export const getExpiryMs = (ttlMs: number, now = Date.now()): number => now + ttlMs;

export const saveComparison = ({ result, expiresAtMs }: StoredComparison): void => {
  purgeExpiredComparisons();
  getStore().set(result.id, { result, expiresAtMs });
};

export const getStoredComparisonState = (
  id: string,
  now = Date.now(),
): StoredComparisonState => {
  const store = getStore();
  const record = store.get(id);

  if (!record) {
    purgeExpiredComparisons(now);
    return { state: "missing" };
  }

  if (isExpired(record, now)) {
    store.delete(id);
    purgeExpiredComparisons(now);
    return { state: "expired" };
  }

  purgeExpiredComparisons(now);
  return { state: "ok", record };
};

export const getComparison = (id: string): DocumentComparison | undefined => {
  const state = getStoredComparisonState(id);
  return state.state === "ok" ? state.record.result : undefined;
};

export const clearComparisons = (): void => {
  getStore().clear();
};

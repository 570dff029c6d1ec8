const ENV_KEY = 'ROTATION_DEBUG';
const CHANNEL = '[rotation-swaps]';

export const DEBUG_AREAS = ['swap', 'validator', 'store', 'env'] as const;
export type DebugArea = (typeof DEBUG_AREAS)[number];

type SwapStep = 'create' | 'created' | 'eligible' | 'transition';
type SwapActionStep = 'confirm' | 'decline' | 'cancel' | 'approve' | 'reject';

export type DebugTopic =
  | `swap.${SwapStep | SwapActionStep}`
  | `validator.${'run' | 'blocked'}`
  | `store.sqlite.${'open' | 'write'}`
  | 'env';

/** `null` means every area; an empty set means none. */
type DebugPreference = ReadonlySet<DebugArea> | null;

function isDebugArea(value: string): value is DebugArea {
  return DEBUG_AREAS.some((area) => area === value);
}

/**
 * `true`/`1` enables every area, `false`/`0` disables logging, and a comma-separated list such
 * as `swap,store` enables only those areas. Unset defers to NODE_ENV.
 */
function readPreference(): DebugPreference | undefined {
  const value = process.env[ENV_KEY]?.trim().toLowerCase();
  if (!value) {
    return undefined;
  }
  if (value === 'false' || value === '0') {
    return new Set();
  }
  if (value === 'true' || value === '1') {
    return null;
  }
  return new Set(value.split(',').map((entry) => entry.trim()).filter(isDebugArea));
}

let cachedPreference = readPreference();

function areaOf(topic: DebugTopic): DebugArea {
  const [head = ''] = topic.split('.');
  return isDebugArea(head) ? head : 'env';
}

function isDebugEnabled(topic: DebugTopic): boolean {
  if (cachedPreference === undefined) {
    return process.env.NODE_ENV === 'development';
  }
  return cachedPreference === null || cachedPreference.has(areaOf(topic));
}

export function setDebugLogging(enabled: boolean | readonly DebugArea[]): void {
  if (typeof enabled === 'boolean') {
    cachedPreference = enabled ? null : new Set();
    return;
  }
  cachedPreference = new Set(enabled);
}

type DebugPayload = unknown | (() => unknown);

function resolvePayload(payload: DebugPayload | undefined): unknown {
  if (typeof payload === 'function') {
    try {
      return payload();
    } catch (error) {
      return { error: error instanceof Error ? error.message : error };
    }
  }
  return payload;
}

export function debugLog(topic: DebugTopic, payload?: DebugPayload): void {
  if (!isDebugEnabled(topic)) {
    return;
  }
  console.info(`${CHANNEL} ${topic}`, resolvePayload(payload));
}

export function withDebugGroup<T>(topic: DebugTopic, payload: DebugPayload, fn: () => T): T {
  if (!isDebugEnabled(topic)) {
    return fn();
  }
  console.info(`${CHANNEL} ▶ ${topic}`, resolvePayload(payload));
  try {
    return fn();
  } finally {
    console.info(`${CHANNEL} ◀ ${topic}`);
  }
}

export function debugError(topic: DebugTopic, payload?: DebugPayload): void {
  if (!isDebugEnabled(topic)) {
    return;
  }
  console.error(`${CHANNEL} ${topic}`, resolvePayload(payload));
}

export function getDebugChannel(): string {
  return CHANNEL;
}

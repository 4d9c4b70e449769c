import { Schema } from "effect";
import { decodeOrThrow } from "./decode";
import { EntityId } from "./schema";

export const SessionNamespace = Schema.Literal("review", "decision");
export type SessionNamespace = typeof SessionNamespace.Type;

export const ReviewSession = Schema.Struct({
  namespace: SessionNamespace,
  actorId: EntityId,
  tagId: EntityId,
  studyId: EntityId,
  // Snapshot taken when the session started; never reordered.
  candidateIds: Schema.Array(EntityId),
  cursor: Schema.Int.pipe(Schema.nonNegative()),
  startedAt: Schema.String,
});
export type ReviewSession = typeof ReviewSession.Type;

/** Per-actor session state, keyed by namespace so loops do not collide. */
export interface SessionStore {
  get(namespace: SessionNamespace, actorId: number): Promise<ReviewSession | null>;
  set(session: ReviewSession): Promise<void>;
  delete(namespace: SessionNamespace, actorId: number): Promise<void>;
  clearActor(actorId: number): Promise<void>;
  /** Drops expired sessions and returns how many were dropped. */
  sweep(): Promise<number>;
}

export interface MemorySessionStoreOptions {
  idleTimeoutMs: number;
  now?: () => Date;
}

interface Entry {
  actorId: number;
  payload: string;
  expiresAt: number;
}

const SessionJson = Schema.parseJson(ReviewSession);

function sessionKey(namespace: SessionNamespace, actorId: number): string {
  return `${namespace}:${actorId}`;
}

export function createMemorySessionStore(options: MemorySessionStoreOptions) {
  const now = options.now ?? (() => new Date());
  const entries = new Map<string, Entry>();

  function expiry(): number {
    return now().getTime() + options.idleTimeoutMs;
  }

  async function get(
    namespace: SessionNamespace,
    actorId: number,
  ): Promise<ReviewSession | null> {
    const key = sessionKey(namespace, actorId);
    const entry = entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= now().getTime()) {
      entries.delete(key);
      return null;
    }
    entry.expiresAt = expiry();
    return decodeOrThrow("session", SessionJson, entry.payload);
  }

  async function set(session: ReviewSession): Promise<void> {
    entries.set(sessionKey(session.namespace, session.actorId), {
      actorId: session.actorId,
      payload: Schema.encodeSync(SessionJson)(session),
      expiresAt: expiry(),
    });
  }

  async function remove(namespace: SessionNamespace, actorId: number): Promise<void> {
    entries.delete(sessionKey(namespace, actorId));
  }

  async function clearActor(actorId: number): Promise<void> {
    for (const [key, entry] of entries) {
      if (entry.actorId === actorId) entries.delete(key);
    }
  }

  async function sweep(): Promise<number> {
    const cutoff = now().getTime();
    let reaped = 0;
    for (const [key, entry] of entries) {
      if (entry.expiresAt <= cutoff) {
        entries.delete(key);
        reaped += 1;
      }
    }
    return reaped;
  }

  function size(): number {
    return entries.size;
  }

  return { get, set, delete: remove, clearActor, sweep, size };
}

export type MemorySessionStore = ReturnType<typeof createMemorySessionStore>;

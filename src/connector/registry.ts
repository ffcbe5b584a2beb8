import { Effect, Option, Ref } from "effect";
import type { ClientHandle, ClientId } from "../transport/types.js";

/**
 * Live connections eligible for broadcasts. Guarded by its own Ref so
 * registry traffic never contends with presence-state updates.
 */
export interface ClientRegistry {
  readonly insert: (handle: ClientHandle) => Effect.Effect<number>;
  readonly remove: (id: ClientId) => Effect.Effect<boolean>;
  readonly lookup: (id: ClientId) => Effect.Effect<Option.Option<ClientHandle>>;
  readonly size: Effect.Effect<number>;
  /** Point-in-time copy; sends happen after the guard is released */
  readonly handles: Effect.Effect<ReadonlyArray<ClientHandle>>;
}

type ClientMap = ReadonlyMap<ClientId, ClientHandle>;

export const makeClientRegistry = (): Effect.Effect<ClientRegistry> =>
  Effect.gen(function* () {
    const ref = yield* Ref.make<ClientMap>(new Map());

    const insert = (handle: ClientHandle) =>
      Ref.modify(ref, (map): readonly [number, ClientMap] => {
        const next = new Map(map).set(handle.id, handle);
        return [next.size, next];
      });

    const remove = (id: ClientId) =>
      Ref.modify(ref, (map): readonly [boolean, ClientMap] => {
        if (!map.has(id)) return [false, map];
        const next = new Map(map);
        next.delete(id);
        return [true, next];
      });

    const lookup = (id: ClientId) =>
      Ref.get(ref).pipe(Effect.map((map) => Option.fromNullable(map.get(id))));

    return {
      insert,
      remove,
      lookup,
      size: Ref.get(ref).pipe(Effect.map((map) => map.size)),
      handles: Ref.get(ref).pipe(Effect.map((map) => [...map.values()])),
    };
  });

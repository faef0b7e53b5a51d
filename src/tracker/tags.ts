import { Effect } from "effect";
import type { ClockifyClient } from "../clockify/client.js";
import type { ClockifyError } from "../clockify/types.js";
import type { Logger } from "../logger.js";

export type TagMap = ReadonlyMap<string, string>;

/** Fetches the workspace tags once and indexes their ids by name. */
export function loadTags(
  client: ClockifyClient,
  logger: Logger
): Effect.Effect<TagMap, ClockifyError> {
  return client.listTags().pipe(
    Effect.map((tags) => {
      const map = new Map<string, string>();
      logger.info("Available Tags:");
      for (const tag of tags) {
        logger.info(` - ${tag.name}`);
        map.set(tag.name, tag.id);
      }
      return map;
    })
  );
}

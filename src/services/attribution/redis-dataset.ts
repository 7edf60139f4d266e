import { RedisClient } from "../redis-client";
import { AttributionDataset, attributionHit } from "./attribution-dataset";
import { AttributionHit } from "../../models/enriched-record";

export const ATTRIBUTION_KEY_PREFIX = "attribution";

/**
 * Redis key holding one address of one dataset
 * Example: attribution:aws:3.5.140.2
 */
export function attributionKey(dataset: string, address: string): string {
  return `${ATTRIBUTION_KEY_PREFIX}:${dataset}:${address}`;
}

/**
 * Attribution rows stored as redis hashes with `org_id` and `platform` fields
 */
export class RedisDataset implements AttributionDataset {
  readonly encoding = "redis";

  constructor(readonly name: string, private readonly redis: RedisClient) {}

  async lookup(address: string): Promise<AttributionHit | null> {
    const data = await this.redis.hGetAll(attributionKey(this.name, address));
    if (Object.keys(data).length === 0) {
      return null;
    }
    return attributionHit(data.org_id, data.platform);
  }

  // The shared connection is owned by the redis client, not the dataset
  async close(): Promise<void> {}
}

/**
 * Thread identifier generation
 */

// ULIDs sort by creation time, so records from one process order naturally
import { ulid } from "ulid";
import type { IdGenerator } from "./types.js";

export class UlidGenerator implements IdGenerator {
  generate(): string {
    return ulid();
  }
}

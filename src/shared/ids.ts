import { v7 as uuidv7 } from "uuid";

/** Time-ordered id used for request correlation in logs and error bodies. */
export function createRequestId(): string {
  return uuidv7();
}

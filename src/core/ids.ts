import { ulid } from "ulid";

export type JobId = `job_${string}`;

export function newJobId(): JobId {
  return `job_${ulid()}`;
}

import { ulid } from "ulid";

export type SubmissionId = `sub_${string}`;

const SUBMISSION_ID_PATTERN = /^sub_[0-9A-HJKMNP-TV-Z]{26}$/;

export function newSubmissionId(): SubmissionId {
  return `sub_${ulid()}`;
}

export function isSubmissionId(value: string): value is SubmissionId {
  return SUBMISSION_ID_PATTERN.test(value);
}

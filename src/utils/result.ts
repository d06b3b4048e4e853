// src/utils/result.ts

// "noop" marks an idempotent repeat (e.g. paying a paid bill): not a failure
export type Outcome = "success" | "noop";

export interface OperationResult<T> {
  outcome: Outcome;
  message: string;
  data: T;
}

export const success = <T>(message: string, data: T): OperationResult<T> => ({
  outcome: "success",
  message,
  data,
});

export const noop = <T>(message: string, data: T): OperationResult<T> => ({
  outcome: "noop",
  message,
  data,
});

// src/services/steps.ts
// Named store calls for multi-step operations on a store without transactions

import { RowStoreError, type RowStoreErrorCode, type TableName } from "../lib/row-store/index.js";

export type StepName =
  | "allocate_id"
  | "append_record"
  | "resolve_child"
  | "resolve_pet"
  | "lookup_child_link"
  | "lookup_pet_link"
  | "read_links"
  | "clear_previous_owner"
  | "assign_pet"
  | "append_link"
  | "delete_child_record"
  | "remove_child_link"
  | "delete_pet_record"
  | "clear_pet_link"
  | "resolve_linked_pet"
  | "resolve_linked_child"
  | "list_records";

/** One row write already applied; rowIndex is the position at the time of the write */
export interface AppliedWrite {
  step: StepName;
  table: TableName;
  rowIndex: number;
  change: "cleared_pet_id" | "deleted_row";
}

export interface StepFailureDetail {
  code: "step_failed";
  step: StepName;
  /** Steps that were applied before the failure; they are not rolled back */
  completedSteps: StepName[];
  /** Row writes of steps that touch several rows, including those of the failed step */
  appliedWrites: AppliedWrite[];
  storeError: { code: RowStoreErrorCode; message: string };
}

export class StepFailure extends Error {
  code = "step_failed" as const;
  step: StepName;
  completedSteps: StepName[];
  appliedWrites: AppliedWrite[];
  storeError: RowStoreError;
  constructor(
    step: StepName,
    completedSteps: StepName[],
    storeError: RowStoreError,
    appliedWrites: AppliedWrite[] = []
  ) {
    super(`Step '${step}' failed: ${storeError.message}`);
    this.step = step;
    this.completedSteps = completedSteps;
    this.appliedWrites = appliedWrites;
    this.storeError = storeError;
    this.name = "StepFailure";
  }

  toDetail(): StepFailureDetail {
    return {
      code: this.code,
      step: this.step,
      completedSteps: [...this.completedSteps],
      appliedWrites: this.appliedWrites.map((w) => ({ ...w })),
      storeError: { code: this.storeError.code, message: this.storeError.message },
    };
  }
}

/**
 * Runs store calls one at a time under a step name. A RowStoreError aborts
 * the operation as a StepFailure carrying the steps already applied.
 */
export class StepTracker {
  readonly completed: StepName[] = [];
  readonly writes: AppliedWrite[] = [];

  async run<T>(step: StepName, fn: () => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      if (err instanceof RowStoreError) {
        throw new StepFailure(step, [...this.completed], err, [...this.writes]);
      }
      throw err;
    }
    this.completed.push(step);
    return result;
  }

  /** Notes a row write inside a step that writes several rows */
  noteWrite(write: AppliedWrite): void {
    this.writes.push(write);
  }
}

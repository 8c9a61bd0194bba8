import type { EngineClient } from "../engine/engine-client.js";
import type { ExternalTask } from "./external-task.js";
import { encodeVariables, type VariableInput } from "./variables.js";

export interface HandleFailureOptions {
  errorMessage: string;
  errorDetails?: string;
  retries: number;
  retryTimeout: number;
}

/**
 * Operations a handler may perform on the task it was given. Failures surface as
 * ExternalTaskClientError (EngineClientError for HTTP problems, ValueMapperError
 * for variables that cannot be encoded).
 */
export interface ExternalTaskService {
  complete(task: ExternalTask, variables?: VariableInput, localVariables?: VariableInput): Promise<void>;
  handleFailure(task: ExternalTask, options: HandleFailureOptions): Promise<void>;
  handleBpmnError(
    task: ExternalTask,
    errorCode: string,
    errorMessage?: string,
    variables?: VariableInput
  ): Promise<void>;
  extendLock(task: ExternalTask, newDuration: number): Promise<void>;
  unlock(task: ExternalTask): Promise<void>;
}

export function createExternalTaskService(engine: EngineClient): ExternalTaskService {
  return {
    async complete(task, variables, localVariables) {
      await engine.complete(task.id, encodeVariables(variables), encodeVariables(localVariables));
    },

    async handleFailure(task, options) {
      await engine.failure(task.id, {
        errorMessage: options.errorMessage,
        errorDetails: options.errorDetails,
        retries: Math.max(0, Math.trunc(options.retries)),
        retryTimeout: Math.max(0, Math.trunc(options.retryTimeout)),
      });
    },

    async handleBpmnError(task, errorCode, errorMessage, variables) {
      await engine.bpmnError(task.id, errorCode, errorMessage, encodeVariables(variables));
    },

    async extendLock(task, newDuration) {
      await engine.extendLock(task.id, newDuration);
    },

    async unlock(task) {
      await engine.unlock(task.id);
    },
  };
}

// src/result.ts
import { toInspectorError, type InspectorError } from './errors.js';

export type OperationSuccess<T> = { ok: true; value: T };
export type OperationFailure = {
    ok: false;
    // What the operation was doing, e.g. "listing schemas"; rendered as "Error <action>: ..."
    action?: string;
    error: InspectorError;
};

/** What every inspector operation returns; nothing is thrown past this boundary. */
export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

export function success<T>(value: T): OperationSuccess<T> {
    return { ok: true, value };
}

export function failure(error: unknown, action?: string): OperationFailure {
    return { ok: false, action, error: toInspectorError(error) };
}

export async function attempt<T>(action: string | undefined, run: () => Promise<T>): Promise<OperationResult<T>> {
    try {
        return success(await run());
    } catch (error: unknown) {
        return failure(error, action);
    }
}

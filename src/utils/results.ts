// types
export type FailureDetails = { status?: number; issues?: ReadonlyArray<unknown> };
export type Success<T> = { success: true; data: T };
export type Failure = { success: false; message: string; details?: FailureDetails };
export type Result<T> = Success<T> | Failure;
export type AsyncResult<T> = Promise<Result<T>>;

// helpers
export const success = <T>(data: T): Success<T> => ({ success: true, data });
export const failure = (message: string, details?: FailureDetails): Failure => ({
	success: false,
	message,
	details,
});

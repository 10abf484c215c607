/**
 * Outcome of a call to an external AI provider.
 *
 * `ok: true` with an empty value means the provider answered with nothing;
 * `ok: false` carries why the call failed.
 */
export type ServiceErrorKind =
	| 'not_configured'
	| 'unavailable'
	| 'timeout'
	| 'rejected'
	| 'invalid_response';

export type ServiceResult<T> =
	| { ok: true; value: T }
	| { ok: false; kind: ServiceErrorKind; message: string };

export function success<T>(value: T): ServiceResult<T> {
	return { ok: true, value };
}

export function failure<T>(kind: ServiceErrorKind, message: string): ServiceResult<T> {
	return { ok: false, kind, message };
}

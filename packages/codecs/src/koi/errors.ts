/**
 * KOI codec errors
 */

export type KoiContractErrorCode =
	| 'ALPHA_NOT_OPAQUE'
	| 'CHANNEL_MISMATCH'
	| 'SESSION_FINISHED'
	| 'PIXEL_COUNT_MISMATCH'
	| 'INVALID_OPTIONS'
	| 'BUFFER_TOO_SMALL'
	| 'INVALID_PIXEL'

export type KoiDataErrorCode =
	| 'INVALID_END_MARKER'
	| 'UNEXPECTED_EOF'
	| 'UNEXPECTED_OPCODE'
	| 'INVALID_HEADER'

export type KoiErrorCode = KoiContractErrorCode | KoiDataErrorCode

export type KoiErrorDetails = Readonly<Record<string, number | string | readonly number[]>>

/**
 * Base class of every error the codec raises itself
 */
export class KoiError extends Error {
	readonly code: KoiErrorCode
	readonly details: KoiErrorDetails

	constructor(code: KoiErrorCode, message: string, details: KoiErrorDetails = {}) {
		super(message)
		this.name = 'KoiError'
		this.code = code
		this.details = details
	}
}

/**
 * The caller broke the codec's usage contract (bad input shape or options)
 */
export class KoiContractError extends KoiError {
	declare readonly code: KoiContractErrorCode

	constructor(code: KoiContractErrorCode, message: string, details?: KoiErrorDetails) {
		super(code, message, details)
		this.name = 'KoiContractError'
	}
}

/**
 * The encoded stream is corrupt or truncated
 */
export class KoiDataError extends KoiError {
	declare readonly code: KoiDataErrorCode

	constructor(code: KoiDataErrorCode, message: string, details?: KoiErrorDetails) {
		super(code, message, details)
		this.name = 'KoiDataError'
	}
}

let isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value)

let hasInvalidToken = (value: unknown): boolean => {
	if (!isRecord(value)) {
		return false
	}

	let status = value['status'] ?? value['status_code']
	if (Number(status) === 401) {
		return true
	}

	let error = String(value['error'] ?? '').toLowerCase()
	let message = String(value['message'] ?? '').toLowerCase()

	return error.includes('invalid_token') || (message.includes('access token') && message.includes('invalid'))
}

/**
 * Detects a successful HTTP status whose JSON body reports a rejected token,
 * at the top level, under `response`, or under `response.body`.
 */
export function isSoftUnauthorized(text: string): boolean {
	let data: unknown
	try {
		data = text ? JSON.parse(text) : {}
	} catch {
		return false
	}

	if (!isRecord(data)) {
		return false
	}

	let body = data['response'] ?? data
	if (hasInvalidToken(body)) {
		return true
	}

	return isRecord(body) && hasInvalidToken(body['body'])
}

import { z } from 'zod'

import type { GapReport } from './types.js'

let GapSchema = z.object({
	device_key: z.string().min(1),
	source_vendor: z.string().nullish(),
	missing_sequences: z.array(z.number().int().positive()),
})

let SendResponseSchema = z
	.object({
		gaps: z.array(z.unknown()).nullish(),
	})
	.passthrough()

export type ParsedSendResponse = {
	gaps: GapReport[]
	warning?: string
}

let describe = (issue: z.ZodIssue | undefined, prefix: (string | number)[] = []) =>
	`unexpected response shape${issue ? ` at ${[...prefix, ...issue.path].join('.') || '<root>'}: ${issue.message}` : ''}`

/**
 * Reads the gap report out of a successful response body. An empty body or
 * a body without `gaps` means no gaps; anything unreadable yields a warning.
 * Each report is checked on its own, so a malformed one does not hide the rest.
 */
export function parseSendResponse(text: string): ParsedSendResponse {
	if (!text.trim()) {
		return { gaps: [] }
	}

	let data: unknown
	try {
		data = JSON.parse(text)
	} catch (error) {
		return { gaps: [], warning: `response is not JSON: ${error instanceof Error ? error.message : String(error)}` }
	}

	let result = SendResponseSchema.safeParse(data)
	if (!result.success) {
		return { gaps: [], warning: describe(result.error.issues[0]) }
	}

	let gaps: GapReport[] = []
	let warning: string | undefined

	for (let [index, entry] of (result.data.gaps ?? []).entries()) {
		let gap = GapSchema.safeParse(entry)
		if (!gap.success) {
			warning ??= describe(gap.error.issues[0], ['gaps', index])
			continue
		}

		gaps.push({
			deviceKey: gap.data.device_key,
			...(typeof gap.data.source_vendor === 'string' && { sourceVendor: gap.data.source_vendor }),
			missingSequences: [...new Set(gap.data.missing_sequences)].sort((a, b) => a - b),
		})
	}

	return { gaps, ...(warning !== undefined && { warning }) }
}

import { expect, test } from 'vitest'

import { parseSendResponse } from './_parse_response.js'

test.each([
	['an empty body', ''],
	['a body without gaps', '{"ok":true}'],
	['an empty gaps list', '{"gaps":[]}'],
	['null gaps', '{"gaps":null}'],
])('reads %s as no gaps', (_, text) => {
	expect(parseSendResponse(text)).toEqual({ gaps: [] })
})

test('reads one gap report per entry with sorted unique sequences', () => {
	let text = JSON.stringify({
		gaps: [
			{ device_key: 'dev-1', source_vendor: 'acme', missing_sequences: [5, 3, 5] },
			{ device_key: 'dev-2', source_vendor: null, missing_sequences: [] },
		],
	})

	expect(parseSendResponse(text)).toEqual({
		gaps: [
			{ deviceKey: 'dev-1', sourceVendor: 'acme', missingSequences: [3, 5] },
			{ deviceKey: 'dev-2', missingSequences: [] },
		],
	})
})

test('warns about a body that is not JSON', () => {
	let parsed = parseSendResponse('<html>ok</html>')

	expect(parsed.gaps).toEqual([])
	expect(parsed.warning).toMatch(/^response is not JSON: /)
})

test('warns about a gap report of the wrong shape', () => {
	let parsed = parseSendResponse('{"gaps":[{"device_key":"dev-1","missing_sequences":["4"]}]}')

	expect(parsed.gaps).toEqual([])
	expect(parsed.warning).toMatch(/^unexpected response shape at gaps\.0\.missing_sequences\.0: /)
})

test('warns about a body that is not an object', () => {
	let parsed = parseSendResponse('[1,2]')

	expect(parsed.gaps).toEqual([])
	expect(parsed.warning).toMatch(/^unexpected response shape at <root>: /)
})

test('keeps the well-formed reports next to a malformed one', () => {
	let text = JSON.stringify({
		gaps: [
			{ device_key: 'dev-1', missing_sequences: [0] },
			{ device_key: 'dev-2', missing_sequences: [7, 6] },
		],
	})

	let parsed = parseSendResponse(text)

	expect(parsed.gaps).toEqual([{ deviceKey: 'dev-2', missingSequences: [6, 7] }])
	expect(parsed.warning).toMatch(/^unexpected response shape at gaps\.0\.missing_sequences\.0: /)
})

import { expect, test } from 'vitest'

import { AccessTokenCredentialsProvider } from './access-token.js'
import { AnonymousCredentialsProvider } from './anonymous.js'

test('adds a bearer header for an access token', async () => {
	let provider = new AccessTokenCredentialsProvider({ token: 'test-token' })

	let headers = await provider.authorize({ Accept: 'application/json' })

	expect(headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-token' })
})

test('leaves headers untouched for anonymous credentials', async () => {
	let provider = new AnonymousCredentialsProvider()

	let headers = await provider.authorize({ Accept: 'application/json' })

	expect(headers).toEqual({ Accept: 'application/json' })
	await expect(provider.getToken()).resolves.eq('')
})

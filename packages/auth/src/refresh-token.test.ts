import { afterEach, expect, test, vi } from 'vitest'

import { AuthError } from '@edgerelay/error'
import { RefreshTokenCredentialsProvider } from './refresh-token.js'

let endpoint = 'https://auth.test/refresh'
let inOneHour = () => Math.floor(Date.now() / 1000) + 3600

afterEach(() => {
	vi.unstubAllGlobals()
})

test('returns the current token while it is far from expiry', async () => {
	let fetchMock = vi.fn()
	vi.stubGlobal('fetch', fetchMock)

	let provider = new RefreshTokenCredentialsProvider(
		{ accessToken: 'test-access', refreshToken: 'test-refresh', expiresAt: inOneHour() },
		{ endpoint }
	)

	await expect(provider.getToken()).resolves.eq('test-access')
	expect(fetchMock).not.toHaveBeenCalled()
})

test('refreshes a token that is within the skew window', async () => {
	let fetchMock = vi.fn(async () => new Response(JSON.stringify({
		response: { access_token: 'new-access', expires_at: 4102444800, refresh_token: 'next-refresh' },
	})))
	vi.stubGlobal('fetch', fetchMock)
	let onRefresh = vi.fn()

	let provider = new RefreshTokenCredentialsProvider(
		{ accessToken: 'test-access', refreshToken: 'test-refresh', expiresAt: Math.floor(Date.now() / 1000) + 30 },
		{ endpoint, onRefresh }
	)

	await expect(provider.getToken()).resolves.eq('new-access')
	expect(fetchMock).toHaveBeenCalledOnce()
	expect(fetchMock).toHaveBeenCalledWith(endpoint, expect.objectContaining({
		method: 'POST',
		body: JSON.stringify({ refresh_token: 'test-refresh' }),
	}))
	expect(onRefresh).toHaveBeenCalledWith({
		accessToken: 'new-access',
		refreshToken: 'next-refresh',
		expiresAt: 4102444800,
	})
})

test('forces a refresh of a long-lived token and keeps the old refresh token', async () => {
	vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ access_token: 'forced-access', expires_at: '4102444800' }))))

	let provider = new RefreshTokenCredentialsProvider(
		{ accessToken: 'test-access', refreshToken: 'test-refresh' },
		{ endpoint }
	)

	await expect(provider.getToken(true)).resolves.eq('forced-access')
	expect(provider.credentials).toEqual({
		accessToken: 'forced-access',
		refreshToken: 'test-refresh',
		expiresAt: 4102444800,
	})
})

test('shares one refresh between concurrent callers', async () => {
	let fetchMock = vi.fn(async () => new Response(JSON.stringify({ access_token: 'shared-access', expires_at: 4102444800 })))
	vi.stubGlobal('fetch', fetchMock)

	let provider = new RefreshTokenCredentialsProvider(
		{ accessToken: 'test-access', refreshToken: 'test-refresh' },
		{ endpoint }
	)

	let tokens = await Promise.all([provider.getToken(true), provider.getToken(true)])

	expect(tokens).toEqual(['shared-access', 'shared-access'])
	expect(fetchMock).toHaveBeenCalledOnce()
})

test('keeps the current token when there is no refresh token', async () => {
	let fetchMock = vi.fn()
	vi.stubGlobal('fetch', fetchMock)

	let provider = new RefreshTokenCredentialsProvider({ accessToken: 'test-access' }, { endpoint })

	await expect(provider.getToken(true)).resolves.eq('test-access')
	expect(fetchMock).not.toHaveBeenCalled()
})

test('rejects with AuthError when the endpoint refuses the refresh token', async () => {
	let fetchMock = vi.fn(async () => new Response('{"error":"invalid_grant"}', { status: 400 }))
	vi.stubGlobal('fetch', fetchMock)

	let provider = new RefreshTokenCredentialsProvider(
		{ accessToken: 'test-access', refreshToken: 'test-refresh' },
		{ endpoint }
	)

	await expect(provider.getToken(true)).rejects.toBeInstanceOf(AuthError)
	expect(fetchMock).toHaveBeenCalledOnce()
})

test('retries the refresh when the endpoint is unavailable', async () => {
	let fetchMock = vi.fn()
		.mockImplementationOnce(async () => new Response('busy', { status: 503 }))
		.mockImplementationOnce(async () => new Response(JSON.stringify({ access_token: 'late-access', expires_at: 4102444800 })))
	vi.stubGlobal('fetch', fetchMock)

	let provider = new RefreshTokenCredentialsProvider(
		{ accessToken: 'test-access', refreshToken: 'test-refresh' },
		{ endpoint }
	)

	await expect(provider.getToken(true)).resolves.eq('late-access')
	expect(fetchMock).toHaveBeenCalledTimes(2)
})

test('rejects a response without an access token', async () => {
	vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ response: { expires_at: 1 } }))))

	let provider = new RefreshTokenCredentialsProvider(
		{ accessToken: 'test-access', refreshToken: 'test-refresh' },
		{ endpoint }
	)

	await expect(provider.getToken(true)).rejects.toThrow('Token refresh failed')
})

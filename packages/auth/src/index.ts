export abstract class CredentialsProvider {
	/**
	 * Returns the current access token, or an empty string when requests go out unauthenticated.
	 * @param force - skip any cached token and obtain a fresh one
	 */
	abstract getToken(force?: boolean, signal?: AbortSignal): Promise<string>

	/**
	 * Adds the bearer `Authorization` header for the current token to `headers`.
	 */
	async authorize(headers: Record<string, string>, force?: boolean, signal?: AbortSignal): Promise<Record<string, string>> {
		let token = await this.getToken(force, signal)
		if (!token) {
			return headers
		}

		return { ...headers, Authorization: `Bearer ${token}` }
	}
}

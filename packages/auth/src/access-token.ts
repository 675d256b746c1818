import { CredentialsProvider } from './index.js'

export type AccessTokenCredentials = {
	token: string
}

/**
 * Long-lived token handed over by the host, e.g. read from its own configuration.
 */
export class AccessTokenCredentialsProvider extends CredentialsProvider {
	#token: string

	constructor(credentials: AccessTokenCredentials) {
		super()
		this.#token = credentials.token
	}

	getToken(): Promise<string> {
		return Promise.resolve(this.#token)
	}
}

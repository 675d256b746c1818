import { CredentialsProvider } from './index.js'

/**
 * Provides anonymous credentials.
 * The token returned by this provider is always an empty string, so no header is sent.
 */
export class AnonymousCredentialsProvider extends CredentialsProvider {
	getToken(): Promise<string> {
		return Promise.resolve('')
	}
}

import { createHash, timingSafeEqual } from "node:crypto";

/**
 * SHA-256 digest of a password
 *
 * @param password Plain text password
 * @returns Hex encoded digest
 */
export function hashPassword(password: string): string {
	return createHash("sha256").update(password, "utf8").digest("hex");
}

/**
 * Guards manual relay control behind the super admin password
 */
export class ManualOverrideAuthorizer {
	private readonly expectedDigest: Buffer | null;

	/**
	 * @param superAdminPassword Password from the adapter configuration; empty disables manual changes
	 */
	constructor(superAdminPassword: string) {
		this.expectedDigest = superAdminPassword ? Buffer.from(hashPassword(superAdminPassword), "hex") : null;
	}

	isEnabled(): boolean {
		return this.expectedDigest !== null;
	}

	/**
	 * Check a credential against the configured password
	 *
	 * @param credential Password supplied with the request
	 * @returns True when manual changes may be applied
	 */
	isAuthorized(credential: string | undefined): boolean {
		if (this.expectedDigest === null || credential === undefined) {
			return false;
		}
		const actual = Buffer.from(hashPassword(credential), "hex");
		return timingSafeEqual(actual, this.expectedDigest);
	}
}

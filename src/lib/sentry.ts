import * as Sentry from "@sentry/node";

const SECRET_PATTERNS: Array<[RegExp, string]> = [
	[/password[=:]\s*\w+/gi, "password=***"],
	[/api[_-]?key[=:]\s*\w+/gi, "apiKey=***"],
	[/token[=:]\s*\w+/gi, "token=***"],
	[/secret[=:]\s*\w+/gi, "secret=***"],
	[/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, "xxx.xxx.xxx.xxx"],
];

/**
 * Remove credentials and IP addresses from a message before it leaves the process
 *
 * @param text Message to scrub
 * @returns Scrubbed message
 */
export function scrubSensitive(text: string): string {
	return SECRET_PATTERNS.reduce((result, [pattern, replacement]) => result.replace(pattern, replacement), text);
}

/**
 * Error tracking and tracing for the tank heating adapter.
 * Every method is a no-op until {@link SentryUtils.init} was called with a DSN.
 */
export class SentryUtils {
	private static initialized = false;

	/**
	 * Initialize Sentry with tracing
	 *
	 * @param dsn Project DSN from the adapter configuration, empty disables reporting
	 * @param adapterVersion Version of the adapter
	 * @param adapterNamespace Namespace of the adapter instance
	 */
	public static init(dsn: string, adapterVersion: string, adapterNamespace?: string): void {
		if (this.initialized || !dsn) {
			return;
		}

		try {
			const isProduction = process.env.NODE_ENV === "production";

			Sentry.init({
				dsn,
				environment: isProduction ? "production" : "development",
				release: `iobroker.tankheating@${adapterVersion}`,
				sendDefaultPii: false,
				sampleRate: isProduction ? 0.1 : 1.0,
				tracesSampleRate: isProduction ? 0.1 : 1.0,
				integrations: [Sentry.httpIntegration(), Sentry.consoleIntegration()],

				beforeSend(event) {
					event.exception?.values?.forEach(exception => {
						if (exception.value) {
							exception.value = scrubSensitive(exception.value);
						}
					});
					if (event.breadcrumbs) {
						event.breadcrumbs = event.breadcrumbs.map(breadcrumb =>
							breadcrumb.message ? { ...breadcrumb, message: scrubSensitive(breadcrumb.message) } : breadcrumb,
						);
					}
					return event;
				},
			});

			if (adapterNamespace) {
				Sentry.setUser({ id: adapterNamespace });
			}

			Sentry.setTags({
				adapter: "tankheating",
				version: adapterVersion,
				platform: "iobroker",
				node_version: process.version,
			});

			this.initialized = true;
		} catch (error) {
			console.warn("Failed to initialize Sentry:", error);
		}
	}

	/**
	 * Run an async operation inside a performance span
	 *
	 * @param name Name of the operation
	 * @param op Operation type (e.g. 'control.cycle')
	 * @param callback Operation to trace
	 */
	public static async startSpanAsync<T>(name: string, op: string, callback: () => Promise<T>): Promise<T> {
		if (!this.initialized) {
			return await callback();
		}

		return await Sentry.startSpan({ name, op }, async span => {
			try {
				const result = await callback();
				span.setStatus({ code: 1 });
				return result;
			} catch (error) {
				span.setStatus({ code: 2, message: "internal_error" });
				span.setAttribute("error", true);
				throw error;
			}
		});
	}

	/**
	 * Capture an exception
	 *
	 * @param error The error to capture
	 * @param context Named context blocks attached to the event
	 * @param level Severity
	 */
	public static captureException(
		error: Error,
		context?: Record<string, Record<string, unknown>>,
		level: Sentry.SeverityLevel = "error",
	): void {
		if (!this.initialized) {
			return;
		}

		try {
			Sentry.withScope(scope => {
				scope.setLevel(level);
				for (const [key, value] of Object.entries(context ?? {})) {
					scope.setContext(key, value);
				}
				Sentry.captureException(error);
			});
		} catch (sentryError) {
			this.warnInternal("captureException", sentryError);
		}
	}

	/**
	 * Capture a plain message
	 *
	 * @param message The message to capture
	 * @param level Severity
	 */
	public static captureMessage(message: string, level: Sentry.SeverityLevel = "info"): void {
		if (!this.initialized) {
			return;
		}

		try {
			Sentry.captureMessage(message, level);
		} catch (sentryError) {
			this.warnInternal("captureMessage", sentryError);
		}
	}

	/**
	 * Add a breadcrumb for better error context
	 *
	 * @param message The breadcrumb message
	 * @param category The category of the breadcrumb
	 * @param level The level of the breadcrumb
	 * @param data Additional data
	 */
	public static addBreadcrumb(
		message: string,
		category = "control",
		level: Sentry.SeverityLevel = "info",
		data?: Record<string, unknown>,
	): void {
		if (!this.initialized) {
			return;
		}

		try {
			Sentry.addBreadcrumb({
				message,
				category,
				level,
				timestamp: Date.now() / 1000,
				data: data ?? {},
			});
		} catch (sentryError) {
			this.warnInternal("addBreadcrumb", sentryError);
		}
	}

	/**
	 * Set additional context for the current scope
	 *
	 * @param key The context key
	 * @param value The context value
	 */
	public static setContext(key: string, value: Record<string, unknown>): void {
		if (!this.initialized) {
			return;
		}

		try {
			Sentry.setContext(key, value);
		} catch (sentryError) {
			this.warnInternal("setContext", sentryError);
		}
	}

	/**
	 * Close Sentry and flush all pending events
	 *
	 * @param timeout Timeout in milliseconds
	 */
	public static async close(timeout = 2000): Promise<boolean> {
		if (!this.initialized) {
			return true;
		}

		try {
			return await Sentry.close(timeout);
		} catch (sentryError) {
			this.warnInternal("close", sentryError);
			return false;
		}
	}

	public static isInitialized(): boolean {
		return this.initialized;
	}

	private static warnInternal(operation: string, error: unknown): void {
		console.warn(`Sentry ${operation} failed:`, error);
	}
}

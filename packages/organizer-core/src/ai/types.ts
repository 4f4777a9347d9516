/**
 * AI invocation types
 *
 * Stage collaborators talk to a model through an AIInvoker so the pipeline
 * never depends on a particular provider, and tests can pass a fake.
 */

/**
 * AI invocation function type
 */
export type AIInvoker = (prompt: string, options?: AIInvokerOptions) => Promise<AIInvokerResult>;

/**
 * Options for AI invocation
 */
export interface AIInvokerOptions {
    /** Model to use (optional, uses default if not specified) */
    model?: string;
    /** Timeout in ms */
    timeoutMs?: number;
}

/**
 * Result from AI invocation
 */
export interface AIInvokerResult {
    /** Whether the invocation succeeded */
    success: boolean;
    /** The AI response (if successful) */
    response?: string;
    /** Error message (if failed) */
    error?: string;
}

/**
 * Result of probing whether a provider answers
 */
export interface AIAvailabilityResult {
    available: boolean;
    /** Why the provider is unavailable */
    reason?: string;
}

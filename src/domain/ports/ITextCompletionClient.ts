/**
 * A single chat message sent to the text-generation capability.
 */
export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface CompletionOptions {
    temperature?: number;
    /** Ask the provider to answer with a JSON object */
    jsonMode?: boolean;
    maxTokens?: number;
}

/**
 * ITextCompletionClient - Port for the text-generation capability.
 * Implementations: OpenAIService
 */
export interface ITextCompletionClient {
    /**
     * Sends the conversation and returns the assistant's reply text.
     * Throws when the capability is unavailable or the request fails.
     */
    complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

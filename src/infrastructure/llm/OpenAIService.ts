import axios from 'axios';
import { ConfigurationError } from '../../domain/errors';
import { ChatMessage, CompletionOptions, ITextCompletionClient } from '../../domain/ports/ITextCompletionClient';

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: string | null } }>;
}

export class OpenAIService implements ITextCompletionClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(apiKey: string, model: string = 'gpt-4', baseUrl: string = 'https://api.openai.com') {
        this.apiKey = apiKey;
        this.model = model;
        this.baseUrl = baseUrl;
    }

    /**
     * Executes a single chat completion request. Failures are not retried;
     * callers fall back to built-in content instead.
     */
    async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
        if (!this.apiKey) {
            throw new ConfigurationError('OPENAI_API_KEY');
        }

        try {
            return await this.executeRequest(messages, options);
        } catch (error) {
            throw this.toError(error);
        }
    }

    private async executeRequest(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
        const { jsonMode = false, temperature = 0.7, maxTokens } = options;

        const response = await axios.post<ChatCompletionResponse>(
            `${this.baseUrl}/v1/chat/completions`,
            {
                model: this.model,
                messages,
                temperature,
                ...(maxTokens !== undefined && { max_tokens: maxTokens }),
                ...(jsonMode && { response_format: { type: 'json_object' } }),
            },
            {
                headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json',
                },
            }
        );

        const content = response.data.choices?.[0]?.message?.content;
        if (typeof content !== 'string') {
            throw new Error('OpenAI response contained no message content');
        }
        return content;
    }

    private toError(error: unknown): unknown {
        if (!axios.isAxiosError(error)) {
            return error;
        }
        const body: unknown = error.response?.data;
        const message = extractErrorMessage(body) ?? error.message;
        return new Error(`OpenAI call failed: ${message}`);
    }
}

function extractErrorMessage(body: unknown): string | undefined {
    if (typeof body !== 'object' || body === null || !('error' in body)) {
        return undefined;
    }
    const { error } = body;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return undefined;
}

/**
 * Parses a JSON response from the model, handling markdown code fences.
 */
export function parseJSON(response: string): unknown {
    try {
        const jsonStr = response.replace(/```json\n?|\n?```/g, '').trim();
        const parsed: unknown = JSON.parse(jsonStr);
        return parsed;
    } catch {
        throw new Error(`Failed to parse LLM response as JSON: ${response.substring(0, 200)}...`);
    }
}

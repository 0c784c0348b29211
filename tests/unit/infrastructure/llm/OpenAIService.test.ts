import nock from 'nock';
import { OpenAIService, parseJSON } from '../../../../src/infrastructure/llm/OpenAIService';
import { ConfigurationError } from '../../../../src/domain/errors';

describe('OpenAIService', () => {
    const baseUrl = 'https://llm.test';
    const messages = [{ role: 'user' as const, content: 'Hello' }];

    beforeEach(() => {
        if (!nock.isActive()) nock.activate();
        nock.disableNetConnect();
    });

    afterEach(() => {
        nock.cleanAll();
        nock.enableNetConnect();
        jest.restoreAllMocks();
    });

    test('should return the message content', async () => {
        nock(baseUrl)
            .post('/v1/chat/completions')
            .matchHeader('authorization', 'Bearer test-secret')
            .reply(200, { choices: [{ message: { content: 'Gratitude' } }] });

        const service = new OpenAIService('test-secret', 'gpt-4', baseUrl);

        await expect(service.complete(messages)).resolves.toBe('Gratitude');
    });

    test('should send model, token limit and JSON response format', async () => {
        let body: unknown;
        nock(baseUrl)
            .post('/v1/chat/completions', (requestBody: unknown) => {
                body = requestBody;
                return true;
            })
            .reply(200, { choices: [{ message: { content: '{}' } }] });

        const service = new OpenAIService('test-secret', 'gpt-4o-mini', baseUrl);
        await service.complete(messages, { jsonMode: true, temperature: 0.2, maxTokens: 50 });

        expect(body).toEqual({
            model: 'gpt-4o-mini',
            messages,
            temperature: 0.2,
            max_tokens: 50,
            response_format: { type: 'json_object' },
        });
    });

    test('should fail with a configuration error when the key is missing', async () => {
        const service = new OpenAIService('', 'gpt-4', baseUrl);

        await expect(service.complete(messages)).rejects.toBeInstanceOf(ConfigurationError);
    });

    test('should not retry a transient error', async () => {
        const scope = nock(baseUrl)
            .post('/v1/chat/completions').reply(503, { error: { message: 'overloaded' } })
            .post('/v1/chat/completions').reply(200, { choices: [{ message: { content: 'Joy' } }] });

        const service = new OpenAIService('test-secret', 'gpt-4', baseUrl);

        await expect(service.complete(messages)).rejects.toThrow('OpenAI call failed: overloaded');
        expect(scope.pendingMocks()).toHaveLength(1);
    });

    test('should surface the API error message', async () => {
        nock(baseUrl)
            .post('/v1/chat/completions').reply(401, { error: { message: 'Incorrect API key provided' } });

        const service = new OpenAIService('test-secret', 'gpt-4', baseUrl);

        await expect(service.complete(messages)).rejects.toThrow('OpenAI call failed: Incorrect API key provided');
    });

    test('should reject a response without content', async () => {
        nock(baseUrl).post('/v1/chat/completions').reply(200, { choices: [] });

        const service = new OpenAIService('test-secret', 'gpt-4', baseUrl);

        await expect(service.complete(messages)).rejects.toThrow('OpenAI response contained no message content');
    });

    describe('parseJSON', () => {
        test('should strip markdown fences', () => {
            expect(parseJSON('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
        });

        test('should throw on invalid JSON', () => {
            expect(() => parseJSON('not json')).toThrow('Failed to parse LLM response as JSON: not json...');
        });
    });
});

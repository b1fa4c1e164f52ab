/**
 * Messages API client with an injected fetch; no network.
 */

import { loadScannerConfig } from '@/lib/schedules/config';
import { ExternalServiceError } from '@/lib/schedules/errors';
import { createScheduleModelClient, EXTRACTION_PROMPT } from '@/lib/schedules/modelClient';

const config = loadScannerConfig({ SCHEDULE_MODEL_API_KEY: 'test-secret' }, '/srv/scanner');

function okResponse(text: string): Response {
  return new Response(JSON.stringify({ content: [{ type: 'text', text }] }), {
    status: 200,
    headers: { 'content-type': 'application/json' },
  });
}

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('createScheduleModelClient', () => {
  it('sends the image with the extraction prompt and returns the text block', async () => {
    const fetchMock = jest.fn(async (_url: string, _init: RequestInit) => okResponse('{"employee_name":"Jane Doe"}'));
    const client = createScheduleModelClient(config, fetchMock);

    const text = await client.extractSchedule({ data: Buffer.from('img'), mediaType: 'image/png' });

    expect(text).toBe('{"employee_name":"Jane Doe"}');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      'anthropic-version': '2023-06-01',
      'content-type': 'application/json',
      'x-api-key': 'test-secret',
    });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'claude-3-haiku-20240307',
      max_tokens: 1024,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: EXTRACTION_PROMPT },
            { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'aW1n' } },
          ],
        },
      ],
    });
  });

  it('sends the schedule JSON for analysis', async () => {
    const fetchMock = jest.fn(async (_url: string, _init: RequestInit) => okResponse('{"total_hours": 8, "summary": "ok"}'));
    const client = createScheduleModelClient(config, fetchMock);

    await expect(client.analyzeSchedule({ employee_name: 'Jane Doe' })).resolves.toBe(
      '{"total_hours": 8, "summary": "ok"}'
    );
    const body = JSON.parse(String(fetchMock.mock.calls[0][1].body));
    expect(body.messages[0].content).toHaveLength(1);
    expect(body.messages[0].content[0].text).toContain('"employee_name": "Jane Doe"');
  });

  it('raises ExternalServiceError with the status on a non-2xx reply', async () => {
    const client = createScheduleModelClient(config, async () => new Response('overloaded', { status: 529 }));
    const error = await client.extractSchedule({ data: Buffer.from('img'), mediaType: 'image/jpeg' }).catch((e) => e);
    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error.status).toBe(529);
    expect(error.message).toBe('Schedule service returned 529');
  });

  it('raises ExternalServiceError when the request fails or times out', async () => {
    const offline = createScheduleModelClient(config, async () => {
      throw new TypeError('fetch failed');
    });
    await expect(offline.analyzeSchedule({})).rejects.toThrow(
      new ExternalServiceError('Could not reach the schedule service')
    );

    const slow = createScheduleModelClient(config, async () => {
      throw Object.assign(new Error('aborted'), { name: 'TimeoutError' });
    });
    await expect(slow.analyzeSchedule({})).rejects.toThrow(
      new ExternalServiceError('The schedule service did not respond in time')
    );
  });

  it('raises ExternalServiceError when the reply has no text content', async () => {
    const client = createScheduleModelClient(
      config,
      async () => new Response(JSON.stringify({ content: [] }), { status: 200 })
    );
    await expect(client.analyzeSchedule({})).rejects.toThrow(
      new ExternalServiceError('No content in schedule service response')
    );
  });
});

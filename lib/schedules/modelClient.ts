/**
 * Calls the hosted vision model (Anthropic Messages API) for the two steps of a scan:
 * 1. read the schedule image into JSON, 2. total the hours and summarize the week.
 * No retries: every failure surfaces as ExternalServiceError.
 */

import type { ScannerConfig } from './config';
import { ExternalServiceError } from './errors';
import type { ScheduleImage } from './types';

export interface ScheduleModelClient {
  extractSchedule(image: ScheduleImage): Promise<string>;
  analyzeSchedule(schedule: unknown): Promise<string>;
}

type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

type ContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } };

export const EXTRACTION_PROMPT = `Please analyze this employee schedule image and return a JSON object with the following structure:
{
    "employee_name": "string",
    "schedule": [
        {
            "day": "string (day of the week, e.g. Monday)",
            "start": "string (shift start, 24-hour HH:MM)",
            "end": "string (shift end, 24-hour HH:MM)",
            "location": "string"
        }
    ]
}
Leave out days the employee is not working. Return only the JSON object.`;

export function analysisPrompt(schedule: unknown): string {
  return `Given this schedule data:
${JSON.stringify(schedule, null, 2)}

Please analyze the schedule and provide:
1. Calculate the total hours worked for the week
2. Write a brief summary of the schedule

Return your response as a JSON object with this structure:
{
    "total_hours": number,
    "summary": "string describing the schedule"
}`;
}

function firstText(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('content' in body)) return null;
  const { content } = body;
  if (!Array.isArray(content)) return null;
  for (const block of content) {
    if (typeof block === 'object' && block !== null && 'text' in block && typeof block.text === 'string') {
      return block.text;
    }
  }
  return null;
}

export function createScheduleModelClient(
  config: ScannerConfig,
  fetchImpl: FetchLike = fetch
): ScheduleModelClient {
  async function send(content: ContentBlock[], step: string): Promise<string> {
    let res: Response;
    try {
      res = await fetchImpl(config.apiUrl, {
        method: 'POST',
        headers: {
          'anthropic-version': config.apiVersion,
          'content-type': 'application/json',
          'x-api-key': config.apiKey,
        },
        body: JSON.stringify({
          model: config.model,
          max_tokens: config.maxTokens,
          messages: [{ role: 'user', content }],
        }),
        signal: AbortSignal.timeout(config.requestTimeoutMs),
      });
    } catch (e) {
      const timedOut = e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError');
      console.warn('[schedules/model]', step, timedOut ? 'timed out' : 'request failed', e);
      throw new ExternalServiceError(
        timedOut ? 'The schedule service did not respond in time' : 'Could not reach the schedule service',
        undefined,
        { cause: e }
      );
    }

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      console.warn('[schedules/model]', step, 'API error', res.status, detail.slice(0, 500));
      throw new ExternalServiceError(`Schedule service returned ${res.status}`, res.status);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (e) {
      throw new ExternalServiceError('Schedule service returned a non-JSON body', res.status, { cause: e });
    }
    const text = firstText(body);
    if (text == null) {
      throw new ExternalServiceError('No content in schedule service response', res.status);
    }
    return text;
  }

  return {
    extractSchedule(image) {
      return send(
        [
          { type: 'text', text: EXTRACTION_PROMPT },
          {
            type: 'image',
            source: { type: 'base64', media_type: image.mediaType, data: image.data.toString('base64') },
          },
        ],
        'extract'
      );
    },
    analyzeSchedule(schedule) {
      return send([{ type: 'text', text: analysisPrompt(schedule) }], 'analyze');
    },
  };
}

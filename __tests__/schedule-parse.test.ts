/**
 * Model reply → ScheduleRecord: shape checks, normalization, hours and anomalies.
 */

import { ParseError } from '@/lib/schedules/errors';
import { extractJsonObject, parseAnalysisOrThrow, parseScheduleOrThrow } from '@/lib/schedules/parse';

const CREATED_AT = '2026-10-18T09:30:15.000Z';

function reply(obj: unknown): string {
  return `Here is the schedule:\n\`\`\`json\n${JSON.stringify(obj)}\n\`\`\``;
}

describe('extractJsonObject', () => {
  it('finds the object inside prose', () => {
    expect(extractJsonObject('Sure! {"a": 1} Hope this helps.')).toEqual({ a: 1 });
  });

  it('throws ParseError when there is no object', () => {
    expect(() => extractJsonObject('I cannot read this image.')).toThrow(
      new ParseError('Could not find JSON in the model response')
    );
  });

  it('throws ParseError for broken JSON', () => {
    expect(() => extractJsonObject('{"employee_name": "Jane",}')).toThrow(ParseError);
  });
});

describe('parseScheduleOrThrow', () => {
  it('maps entries, skips off days and totals hours', () => {
    const record = parseScheduleOrThrow(
      reply({
        employee_name: ' Jane Doe ',
        schedule: [
          { day: 'Monday', start: '09:00', end: '17:00', location: 'Main St' },
          { day: 'Tuesday', hours: '9:00 AM to 1:30 PM' },
          { day: 'Wednesday', start: 'OFF', end: 'OFF' },
        ],
      }),
      { createdAt: CREATED_AT }
    );

    expect(record).toEqual({
      employeeName: 'Jane Doe',
      entries: [
        { day: 'Mon', start: '09:00', end: '17:00', location: 'Main St', hours: 8 },
        { day: 'Tue', start: '09:00', end: '13:30', hours: 4.5 },
      ],
      totalHours: 12.5,
      summary: '',
      createdAt: CREATED_AT,
      anomalies: [],
    });
  });

  it('clips a negative duration to zero and flags it', () => {
    const record = parseScheduleOrThrow(
      reply({
        employee_name: 'Jane Doe',
        schedule: [
          { day: 'Thu', start: '09:00', end: '17:00' },
          { day: 'Fri', start: '22:00', end: '06:00' },
        ],
      }),
      { createdAt: CREATED_AT }
    );

    expect(record.entries[1]).toEqual({ day: 'Fri', start: '22:00', end: '06:00', hours: 0 });
    expect(record.totalHours).toBe(8);
    expect(record.anomalies).toEqual([
      {
        day: 'Fri',
        code: 'NEGATIVE_DURATION',
        message: 'Fri ends (06:00) before it starts (22:00); counted as 0 hours',
      },
    ]);
  });

  it('totals minutes before rounding', () => {
    const record = parseScheduleOrThrow(
      reply({
        employee_name: 'Jane Doe',
        schedule: ['Mon', 'Tue', 'Wed'].map((day) => ({ day, start: '09:00', end: '17:20' })),
      }),
      { createdAt: CREATED_AT }
    );

    expect(record.entries.map((e) => e.hours)).toEqual([8.33, 8.33, 8.33]);
    expect(record.totalHours).toBe(25);
  });

  it('flags a 24-hour shift that ends before it starts', () => {
    const record = parseScheduleOrThrow(
      reply({ employee_name: 'Jane Doe', schedule: [{ day: 'Mon', start: '10:00', end: '02:00' }] }),
      { createdAt: CREATED_AT }
    );

    expect(record.entries).toEqual([{ day: 'Mon', start: '10:00', end: '02:00', hours: 0 }]);
    expect(record.totalHours).toBe(0);
    expect(record.anomalies).toEqual([
      {
        day: 'Mon',
        code: 'NEGATIVE_DURATION',
        message: 'Mon ends (02:00) before it starts (10:00); counted as 0 hours',
      },
    ]);
  });

  it('flags unknown days, unreadable times and repeated days', () => {
    const record = parseScheduleOrThrow(
      reply({
        employee_name: 'Jane Doe',
        schedule: [
          { day: 'Someday', start: '9', end: '5' },
          { day: 'Mon', hours: '9-5' },
          { day: 'Mon', hours: '6pm-8pm' },
          { day: 'Thu', hours: 'morning' },
        ],
      }),
      { createdAt: CREATED_AT }
    );

    expect(record.entries.map((e) => [e.day, e.start, e.end, e.hours])).toEqual([
      ['Mon', '09:00', '17:00', 8],
      ['Mon', '18:00', '20:00', 2],
    ]);
    expect(record.anomalies.map((a) => a.code)).toEqual(['UNKNOWN_DAY', 'DUPLICATE_DAY', 'UNPARSED_TIME']);
    expect(record.anomalies[0].message).toBe('Unrecognized day "Someday"');
  });

  it('throws when the employee name is missing', () => {
    expect(() =>
      parseScheduleOrThrow(reply({ schedule: [{ day: 'Mon', hours: '9-5' }] }), { createdAt: CREATED_AT })
    ).toThrow(new ParseError('Could not find employee name in schedule'));
  });

  it('throws when no entries are found', () => {
    expect(() =>
      parseScheduleOrThrow(reply({ employee_name: 'Jane Doe', schedule: [] }), { createdAt: CREATED_AT })
    ).toThrow(new ParseError('No schedule entries found'));
    expect(() =>
      parseScheduleOrThrow(reply({ employee_name: 'Jane Doe', schedule: [{ day: 'Sun', hours: 'OFF' }] }), {
        createdAt: CREATED_AT,
      })
    ).toThrow(new ParseError('No schedule entries found'));
  });
});

describe('parseAnalysisOrThrow', () => {
  it('reads total hours and summary', () => {
    expect(parseAnalysisOrThrow('{"total_hours": 38.5, "summary": "Five day week"}')).toEqual({
      totalHours: 38.5,
      summary: 'Five day week',
    });
  });

  it('accepts a numeric string and nulls anything else', () => {
    expect(parseAnalysisOrThrow('{"total_hours": "40", "summary": "x"}').totalHours).toBe(40);
    expect(parseAnalysisOrThrow('{"total_hours": "about forty", "summary": "x"}').totalHours).toBeNull();
  });

  it('throws without a summary', () => {
    expect(() => parseAnalysisOrThrow('{"total_hours": 40}')).toThrow(
      new ParseError('Analysis response has no summary')
    );
  });
});

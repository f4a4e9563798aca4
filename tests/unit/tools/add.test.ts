/**
 * Tests for ledger_add tool
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/services/ledger/index.js', () => ({
  getLedger: vi.fn(),
}));

vi.mock('../../../src/utils/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { addHandler } from '../../../src/tools/add.js';
import { getLedger } from '../../../src/services/ledger/index.js';

const storedRecord = {
  date: '2020-02-01',
  start_time: '08:00',
  end_time: '16:00',
  break_minutes: 30,
};

const mockLedger = {
  addOrUpdateDay: vi.fn(),
  addNote: vi.fn(),
};

describe('ledger_add tool', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    (getLedger as ReturnType<typeof vi.fn>).mockReturnValue(mockLedger);
    mockLedger.addOrUpdateDay.mockReturnValue(storedRecord);
    mockLedger.addNote.mockReturnValue(12);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('requires at least one field or a note', async () => {
    const result = await addHandler({ date: '2020-02-01' });
    expect(result).toEqual({
      success: false,
      error: 'input: At least one of start_time, end_time, break_minutes or note needs to be set',
      code: 'VALIDATION_ERROR',
    });
    expect(mockLedger.addOrUpdateDay).not.toHaveBeenCalled();
  });

  it('accepts a zero break as the only field', async () => {
    const result = await addHandler({ date: '2020-02-01', break_minutes: 0 });
    expect(mockLedger.addOrUpdateDay).toHaveBeenCalledWith(
      '2020-02-01',
      { break_minutes: 0 },
      true
    );
    expect(result).toMatchObject({ success: true });
  });

  it('rejects a malformed time', async () => {
    const result = await addHandler({ start_time: '8am' });
    expect(result).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
  });

  it('rejects a negative break', async () => {
    const result = await addHandler({ break_minutes: -5 });
    expect(result).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
  });

  it('records the supplied fields with overwrite on by default', async () => {
    const result = await addHandler({
      date: '2020-02-01',
      start_time: '08:00',
      end_time: '16:00',
      break_minutes: 30,
    });

    expect(mockLedger.addOrUpdateDay).toHaveBeenCalledWith(
      '2020-02-01',
      { start_time: '08:00', end_time: '16:00', break_minutes: 30 },
      true
    );
    expect(mockLedger.addNote).not.toHaveBeenCalled();
    expect(result).toEqual({
      success: true,
      data: { date: '2020-02-01', record: storedRecord, message: 'Recorded 2020-02-01' },
    });
  });

  it('passes overwrite: false through', async () => {
    await addHandler({ date: '2020-02-01', start_time: '12:00', overwrite: false });
    expect(mockLedger.addOrUpdateDay).toHaveBeenCalledWith(
      '2020-02-01',
      { start_time: '12:00', end_time: undefined, break_minutes: undefined },
      false
    );
  });

  it('adds a note after updating the day', async () => {
    const result = await addHandler({ date: '2020-03-02', note: 'remote day' });

    expect(mockLedger.addOrUpdateDay).toHaveBeenCalledWith(
      '2020-03-02',
      { start_time: undefined, end_time: undefined, break_minutes: undefined },
      true
    );
    expect(mockLedger.addNote).toHaveBeenCalledWith('2020-03-02', 'remote day');
    expect(result).toMatchObject({
      success: true,
      data: { note_id: 12, message: 'Recorded 2020-03-02 with note 12' },
    });
  });

  it('defaults the date to today and expands "now"', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2021, 0, 4, 9, 30));

    await addHandler({ start_time: 'now' });

    expect(mockLedger.addOrUpdateDay).toHaveBeenCalledWith(
      '2021-01-04',
      { start_time: '09:30', end_time: undefined, break_minutes: undefined },
      true
    );
  });

  it('reports storage failures', async () => {
    mockLedger.addOrUpdateDay.mockImplementation(() => {
      throw new Error('database is locked');
    });

    const result = await addHandler({ date: '2020-02-01', end_time: '17:00' });
    expect(result).toEqual({ success: false, error: 'database is locked', code: 'ADD_ERROR' });
  });
});

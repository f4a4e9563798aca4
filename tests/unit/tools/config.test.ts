/**
 * Tests for ledger_config tool
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/services/ledger/index.js', () => ({
  getLedger: vi.fn(),
}));

vi.mock('../../../src/utils/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { configHandler } from '../../../src/tools/config.js';
import { getLedger } from '../../../src/services/ledger/index.js';
import { SettingNotFoundError } from '../../../src/services/store/settings-store.js';

const mockLedger = {
  listSettings: vi.fn(),
  getSetting: vi.fn(),
  setSetting: vi.fn(),
  deleteSetting: vi.fn(),
};

describe('ledger_config tool', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    (getLedger as ReturnType<typeof vi.fn>).mockReturnValue(mockLedger);
  });

  it('requires a known action', async () => {
    const result = await configHandler({ action: 'reset' });
    expect(result).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
  });

  it('requires a value for set', async () => {
    const result = await configHandler({ action: 'set', key: 'expected_workday_hours' });
    expect(result).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
    expect(mockLedger.setSetting).not.toHaveBeenCalled();
  });

  it('lists settings', async () => {
    mockLedger.listSettings.mockReturnValue([{ key: 'expected_workday_hours', value: '7.8' }]);
    const result = await configHandler({ action: 'list' });
    expect(result).toEqual({
      success: true,
      data: { settings: [{ key: 'expected_workday_hours', value: '7.8' }] },
    });
  });

  it('gets a setting', async () => {
    mockLedger.getSetting.mockReturnValue('7.8');
    const result = await configHandler({ action: 'get', key: 'expected_workday_hours' });
    expect(result).toEqual({
      success: true,
      data: { key: 'expected_workday_hours', value: '7.8' },
    });
  });

  it('maps a missing key to NOT_FOUND', async () => {
    mockLedger.getSetting.mockImplementation((key: string) => {
      throw new SettingNotFoundError(key);
    });
    const result = await configHandler({ action: 'get', key: 'missing' });
    expect(result).toEqual({
      success: false,
      error: 'Setting not found: missing',
      code: 'NOT_FOUND',
    });
  });

  it('stores numeric values as strings', async () => {
    const result = await configHandler({ action: 'set', key: 'expected_workday_hours', value: 8 });
    expect(mockLedger.setSetting).toHaveBeenCalledWith('expected_workday_hours', '8');
    expect(result).toEqual({
      success: true,
      data: { key: 'expected_workday_hours', value: '8' },
    });
  });

  it('deletes a setting', async () => {
    mockLedger.deleteSetting.mockReturnValue(false);
    const result = await configHandler({ action: 'delete', key: 'missing' });
    expect(mockLedger.deleteSetting).toHaveBeenCalledWith('missing');
    expect(result).toEqual({ success: true, data: { key: 'missing', removed: false } });
  });
});

import { describe, expect, it } from 'vitest';
import { formatSummary, formatYyyymmdd, parseSummary } from '../src/services/qcSummary';

describe('qcSummary', () => {
  const metrics = [
    { name: 'tmean_phantom', value: 812.25 },
    { name: 'tmean_snr', value: NaN, inconclusive: 'frameAveragedSnr: noise mean is near zero' },
  ];

  it('writes metadata before metrics', () => {
    const text = formatSummary({
      metrics,
      scanInfo: {
        scannerSerial: 'SN-7',
        acquisitionDate: '20240102',
        rfFrequencyMHz: 63.87,
        repetitionTimeMs: 2500,
        volumeCount: 120,
      },
      analysisDate: new Date(2024, 0, 3),
    });

    expect(text).toBe(
      [
        'scanner_serial SN-7',
        'acq_date 20240102',
        'analysis_date 20240103',
        'scanner_freq 63.87',
        'tr_ms 2500',
        'num_volumes 120',
        'tmean_phantom 812.250000',
        'tmean_snr NaN',
        '',
      ].join('\n')
    );
  });

  it('omits metadata when the scan is unknown', () => {
    expect(formatSummary({ metrics, scanInfo: null, analysisDate: new Date() })).toBe(
      'tmean_phantom 812.250000\ntmean_snr NaN\n'
    );
  });

  it('parses metrics and metadata separately and maps legacy names', () => {
    const parsed = parseSummary('# header\nacq_date 20240102\ntsd_nyquist 0.5\nmax_ady 3\ntmean_snr NaN\n\nbroken\n');
    expect(Object.fromEntries(parsed.info)).toEqual({ acq_date: '20240102' });
    expect(parsed.metrics.get('tsd_ghost')).toBe(0.5);
    expect(parsed.metrics.get('max_abs_dy')).toBe(3);
    expect(parsed.metrics.get('tmean_snr')).toBeNaN();
    expect(parsed.metrics.size).toBe(3);
  });

  it('formats dates in local time', () => {
    expect(formatYyyymmdd(new Date(2023, 11, 9, 23, 30))).toBe('20231209');
  });
});

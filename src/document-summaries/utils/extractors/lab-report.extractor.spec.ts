import { extractLabReport, parseLabLine } from './lab-report.extractor';

describe('parseLabLine', () => {
  it('should parse value, unit and parenthesised reference', () => {
    expect(parseLabLine('Hemoglobin: 14.2 g/dL (13.0-17.0)')).toEqual({
      name: 'Hemoglobin',
      value: '14.2',
      unit: 'g/dL',
      reference: '13.0-17.0',
    });
  });

  it('should parse a trailing low flag', () => {
    expect(parseLabLine('Platelets: 45 x10^9/L (150-400) L')).toEqual({
      name: 'Platelets',
      value: '45',
      unit: 'x10^9/L',
      reference: '150-400',
      flag: 'L',
    });
  });

  it('should parse a labelled reference range and critical flag', () => {
    expect(
      parseLabLine('Potassium: 6.9 mmol/L Reference: 3.5-5.1 critical'),
    ).toEqual({
      name: 'Potassium',
      value: '6.9',
      unit: 'mmol/L',
      reference: '3.5-5.1',
      flag: 'critical',
    });
  });

  it('should keep critical when a high flag comes first', () => {
    expect(parseLabLine('Potassium: 6.8 mmol/L (3.5-5.1) H critical')).toEqual(
      {
        name: 'Potassium',
        value: '6.8',
        unit: 'mmol/L',
        reference: '3.5-5.1',
        flag: 'critical',
      },
    );
  });

  it('should not mistake a flag for a unit', () => {
    expect(parseLabLine('Glucose: 250 H')).toEqual({
      name: 'Glucose',
      value: '250',
      unit: '',
      reference: '',
      flag: 'H',
    });
  });

  it('should skip dates and non-result lines', () => {
    expect(parseLabLine('Collected: 2026-03-01')).toBeNull();
    expect(parseLabLine('Comment: sample slightly hemolysed')).toBeNull();
  });
});

describe('extractLabReport', () => {
  it('should split abnormal and critical values', () => {
    const report = [
      'Sodium: 140 mmol/L (135-145)',
      'ALT: 120 U/L (7-56) *',
      'Potassium: 6.9 mmol/L (3.5-5.1) critical',
      'Troponin: 2.4 ng/mL (0-0.04) H critical',
    ].join('\n');

    const data = extractLabReport(report);

    expect(data.tests.map((test) => test.name)).toEqual([
      'Sodium',
      'ALT',
      'Potassium',
      'Troponin',
    ]);
    expect(data.abnormalValues.map((test) => test.name)).toEqual([
      'ALT',
      'Potassium',
      'Troponin',
    ]);
    expect(data.criticalValues).toEqual([
      {
        name: 'Potassium',
        value: '6.9',
        unit: 'mmol/L',
        reference: '3.5-5.1',
        flag: 'critical',
      },
      {
        name: 'Troponin',
        value: '2.4',
        unit: 'ng/mL',
        reference: '0-0.04',
        flag: 'critical',
      },
    ]);
  });
});

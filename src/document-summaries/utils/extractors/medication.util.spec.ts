import {
  extractListedMedications,
  extractMedications,
  formatMedication,
} from './medication.util';

describe('extractMedications', () => {
  it('should read drug-like names with a dose in mg, g or ml', () => {
    expect(
      extractMedications(
        'Started Amoxicillin 500 mg and Metoclopramide 10 ml, then ibuprofen 400 mg.',
      ).map(formatMedication),
    ).toEqual([
      'Amoxicillin 500 mg',
      'Metoclopramide 10 ml',
      'ibuprofen 400 mg',
    ]);
  });

  it('should ignore other units', () => {
    expect(extractMedications('Vancomycin 500 mcg was given.')).toEqual([]);
  });

  it('should drop repeated mentions', () => {
    expect(
      extractListedMedications('Paracetamol 500 mg\nParacetamol 500 mg'),
    ).toEqual([{ name: 'Paracetamol', dose: '500', unit: 'mg' }]);
  });
});

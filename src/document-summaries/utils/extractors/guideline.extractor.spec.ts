import { extractGuideline } from './guideline.extractor';

describe('extractGuideline', () => {
  const guidelineText = [
    'Oral fluids are recommended for all febrile patients.',
    'Level A evidence: early fluid resuscitation reduces mortality.',
    'Aspirin is contraindicated in suspected dengue.',
    'NSAIDs should not be given to patients with bleeding.',
    'Monitor hematocrit and urine output.',
    'Check platelet count daily during the critical phase.',
  ].join(' ');

  it('should extract recommendations by strength then evidence level', () => {
    expect(extractGuideline(guidelineText).recommendations).toEqual([
      { text: 'for all febrile patients', strength: 'recommended' },
      {
        text: 'early fluid resuscitation reduces mortality',
        evidenceLevel: 'A',
      },
    ]);
  });

  it('should extract contraindications', () => {
    expect(extractGuideline(guidelineText).contraindications).toEqual([
      'suspected dengue',
      'patients with bleeding',
    ]);
  });

  it('should extract monitoring instructions', () => {
    expect(extractGuideline(guidelineText).monitoring).toEqual([
      'hematocrit and urine output',
      'platelet count',
    ]);
  });

  it('should drop monitoring statements of 100 characters or more', () => {
    const longInstruction = `monitor ${'vital signs '.repeat(10)}`;

    expect(extractGuideline(longInstruction).monitoring).toEqual([]);
  });
});

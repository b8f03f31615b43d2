import { extractTextbook } from './textbook.extractor';

describe('extractTextbook', () => {
  const textbookText = [
    'Chapter 1: Arboviral Infections',
    'Dengue is a viral disease transmitted by mosquitoes. Dengue is an acute disease of the tropics.',
    'Marfan syndrome characterized by tall stature and lens dislocation.',
    'Chapter 2. Supportive Care',
    'Treatment includes oral rehydration and antipyretics.',
    'First-line therapy is isotonic crystalloid infusion.',
    'Diagnostic criteria: fever with two warning signs in an endemic area.',
    'Remember that aspirin raises the risk of bleeding in these patients.',
  ].join('\n');

  it('should extract chapter headings in order', () => {
    expect(extractTextbook(textbookText).chapters).toEqual([
      { number: 1, title: 'Arboviral Infections' },
      { number: 2, title: 'Supportive Care' },
    ]);
  });

  it('should keep the first definition of each disease', () => {
    expect(extractTextbook(textbookText).diseases).toEqual([
      {
        name: 'Dengue',
        definition: 'viral disease transmitted by mosquitoes',
      },
      { name: 'Marfan', definition: 'tall stature and lens dislocation' },
    ]);
  });

  it('should extract treatment statements', () => {
    expect(extractTextbook(textbookText).treatments).toEqual([
      'oral rehydration and antipyretics',
      'isotonic crystalloid infusion',
    ]);
  });

  it('should extract diagnostic criteria before key points', () => {
    expect(extractTextbook(textbookText).keyConcepts).toEqual([
      {
        type: 'diagnostic_criteria',
        content: 'fever with two warning signs in an endemic area',
      },
      {
        type: 'key_point',
        content: 'aspirin raises the risk of bleeding in these patients',
      },
    ]);
  });

  it('should keep only the first diagnostic criteria statement', () => {
    const concepts = extractTextbook(
      [
        'Diagnostic criteria: fever with two warning signs in an endemic area.',
        'Diagnostic criteria: rash with arthralgia after travel to the tropics.',
      ].join('\n'),
    ).keyConcepts;

    expect(concepts).toEqual([
      {
        type: 'diagnostic_criteria',
        content: 'fever with two warning signs in an endemic area',
      },
    ]);
  });

  it('should return empty lists for plain prose', () => {
    expect(extractTextbook('no structure here')).toEqual({
      strategy: 'textbook',
      chapters: [],
      diseases: [],
      treatments: [],
      keyConcepts: [],
    });
  });
});

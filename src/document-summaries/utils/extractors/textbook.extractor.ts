import {
  ChapterHeading,
  DiseaseEntity,
  KeyConcept,
  TextbookExtraction,
} from '../../domain/entities/extracted-data.entity';
import {
  allCaptures,
  allMatches,
  collapseWhitespace,
  firstCapture,
} from './pattern.util';

const CHAPTER_PATTERN = /Chapter\s+(\d+)[:.]?[ \t]*([^\n]{1,100})/gi;

// Case-sensitive: disease names start with a capital letter
const DISEASE_PATTERNS = [
  /([A-Z][a-z]+(?:\s+[a-z]+)?)\s+is\s+an?\s+([^.]*disease[^.]*)/g,
  /([A-Z][a-z]+(?:\s+[a-z]+)?)\s+(?:syndrome|disorder)\s+characterized\s+by\s+([^.]+)/g,
];

const DIAGNOSTIC_CRITERIA_PATTERN = /diagnostic\s+criteria[:\s]+([^.]{20,500})/i;
const KEY_POINT_PATTERNS = [
  /(?:key\s+points?|summary|important\s+points?)[:\s]+([^.]{20,500})/gi,
  /(?:remember|note)\s+that\s+([^.]{20,200})/gi,
];

const TREATMENT_PATTERNS = [
  /treatment\s+(?:includes|consists\s+of|involves)\s+([^.]+)/gi,
  /first[\s-]line\s+(?:treatment|therapy)\s+(?:is|includes)\s+([^.]+)/gi,
];

function extractChapters(text: string): ChapterHeading[] {
  return allMatches(text, CHAPTER_PATTERN)
    .map((match) => ({
      number: parseInt(match[1], 10),
      title: collapseWhitespace(match[2]),
    }))
    .filter((chapter) => chapter.title.length > 0);
}

function extractDiseases(text: string): DiseaseEntity[] {
  const diseases: DiseaseEntity[] = [];

  for (const pattern of DISEASE_PATTERNS) {
    for (const match of allMatches(text, pattern)) {
      const name = collapseWhitespace(match[1]);
      // First definition wins
      if (diseases.some((disease) => disease.name === name)) {
        continue;
      }
      diseases.push({ name, definition: collapseWhitespace(match[2]) });
    }
  }

  return diseases;
}

function extractKeyConcepts(text: string): KeyConcept[] {
  // Only the first criteria statement is kept
  const criteriaText = firstCapture(text, [DIAGNOSTIC_CRITERIA_PATTERN]);
  const criteria: KeyConcept[] = criteriaText
    ? [{ type: 'diagnostic_criteria', content: criteriaText }]
    : [];

  const keyPoints: KeyConcept[] = allCaptures(text, KEY_POINT_PATTERNS).map(
    (content) => ({ type: 'key_point', content }),
  );

  return [...criteria, ...keyPoints];
}

/**
 * Textbook Extractor
 *
 * Chapter headings, disease definitions, treatment statements and key
 * teaching points.
 */
export function extractTextbook(text: string): TextbookExtraction {
  return {
    strategy: 'textbook',
    chapters: extractChapters(text),
    diseases: extractDiseases(text),
    treatments: allCaptures(text, TREATMENT_PATTERNS, { maxLength: 200 }),
    keyConcepts: extractKeyConcepts(text),
  };
}

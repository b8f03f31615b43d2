import {
  GuidelineExtraction,
  Recommendation,
} from '../../domain/entities/extracted-data.entity';
import { allCaptures, allMatches, collapseWhitespace } from './pattern.util';

const STRENGTH_PATTERN = /\b(recommend(?:s|ed)?|should\s+be|must\s+be)\s+([^.]+)/gi;
const EVIDENCE_PATTERN =
  /Level\s+([A-C])\s+(?:evidence|recommendation)[:\s]+([^.]+)/gi;

const CONTRAINDICATION_PATTERNS = [
  /contraindicated\s+in\s+([^.]+)/gi,
  /should\s+not\s+be\s+(?:used|given)\s+(?:in|to)\s+([^.]+)/gi,
  /avoid\s+(?:in|for)\s+([^.]+)/gi,
];

const MONITORING_PATTERNS = [
  /\bmonitor\s+([^.]+)/gi,
  /\bcheck\s+([^.]+?)\s+(?:every|daily|weekly)\b/gi,
  /follow[\s-]up\s+([^.]+)/gi,
];

function extractRecommendations(text: string): Recommendation[] {
  const byStrength = allMatches(text, STRENGTH_PATTERN).map((match) => ({
    text: collapseWhitespace(match[2]),
    strength: collapseWhitespace(match[1]).toLowerCase(),
  }));

  const byEvidence = allMatches(text, EVIDENCE_PATTERN).map((match) => ({
    text: collapseWhitespace(match[2]),
    evidenceLevel: match[1].toUpperCase(),
  }));

  return [...byStrength, ...byEvidence].filter(
    (recommendation) => recommendation.text.length > 0,
  );
}

/**
 * Guideline Extractor
 *
 * Recommendations with their strength wording or evidence level,
 * contraindications and monitoring instructions.
 */
export function extractGuideline(text: string): GuidelineExtraction {
  return {
    strategy: 'guideline',
    recommendations: extractRecommendations(text),
    contraindications: allCaptures(text, CONTRAINDICATION_PATTERNS),
    monitoring: allCaptures(text, MONITORING_PATTERNS, { maxLength: 100 }),
  };
}

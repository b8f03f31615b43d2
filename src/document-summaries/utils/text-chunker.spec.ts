import { DocumentType } from '../domain/enums/document-type.enum';
import { ImageClassification } from '../domain/enums/image-classification.enum';
import {
  buildImageChunks,
  buildTextChunks,
  chunkText,
  chunkingFor,
} from './text-chunker';

describe('chunkText', () => {
  it('should carry the overlap into the next chunk', () => {
    expect(
      chunkText('Alpha beta. Gamma delta. Epsilon zeta.', {
        size: 30,
        overlap: 10,
      }),
    ).toEqual(['Alpha beta. Gamma delta.', 'ma delta. Epsilon zeta.']);
  });

  it('should keep short text in a single chunk', () => {
    expect(chunkText('One line.\nSecond line', { size: 512, overlap: 128 })).toEqual(
      ['One line. Second line.'],
    );
  });

  it('should not drop a sentence longer than the chunk size', () => {
    const longSentence = 'x'.repeat(40);

    expect(chunkText(`${longSentence}. Short one`, { size: 20, overlap: 5 })).toEqual(
      [`${longSentence}.`, 'xxx. Short one.'],
    );
  });
});

describe('chunkingFor', () => {
  it('should use type-specific sizes with a default', () => {
    expect(chunkingFor(DocumentType.TEXTBOOK)).toEqual({
      size: 768,
      overlap: 200,
    });
    expect(chunkingFor(DocumentType.LAB_REPORT)).toEqual({
      size: 256,
      overlap: 50,
    });
    expect(chunkingFor(DocumentType.RESEARCH_ARTICLE)).toEqual({
      size: 512,
      overlap: 128,
    });
  });
});

describe('chunk builders', () => {
  it('should number text chunks by document key', () => {
    const chunks = buildTextChunks(
      'abc123def456',
      DocumentType.CASE_REPORT,
      'Fever. Rash.',
    );

    expect(chunks).toEqual([
      {
        id: 'abc123def456_0',
        text: 'Fever. Rash.',
        metadata: {
          documentKey: 'abc123def456',
          documentType: DocumentType.CASE_REPORT,
          chunkIndex: 0,
          chunkType: 'text',
        },
      },
    ]);
  });

  it('should name image chunks by image index', () => {
    const [chunk] = buildImageChunks('abc123def456', DocumentType.CASE_REPORT, [
      {
        pageNumber: 2,
        index: 3,
        captionText: 'Petechial rash on forearm',
        classificationTag: ImageClassification.CLINICAL_FINDING,
      },
    ]);

    expect(chunk.id).toBe('abc123def456_img_3');
    expect(chunk.text).toBe('Image: Petechial rash on forearm');
    expect(chunk.metadata.pageNumber).toBe(2);
  });
});

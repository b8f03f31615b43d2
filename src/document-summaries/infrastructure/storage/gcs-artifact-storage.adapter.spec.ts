import { ConfigService } from '@nestjs/config';
import { GcsArtifactStorageAdapter } from './gcs-artifact-storage.adapter';
import { AllConfigType } from '../../../config/config.type';

const mockSave = jest.fn();
const mockExists = jest.fn();
const mockDownload = jest.fn();
const mockBucketExists = jest.fn();
const mockFile = jest.fn();

jest.mock('@google-cloud/storage', () => ({
  Storage: jest.fn().mockImplementation(() => ({
    bucket: (name: string) => ({
      name,
      file: mockFile,
      exists: mockBucketExists,
    }),
  })),
}));

describe('GcsArtifactStorageAdapter', () => {
  let adapter: GcsArtifactStorageAdapter;

  beforeEach(() => {
    jest.clearAllMocks();
    delete process.env.GOOGLE_APPLICATION_CREDENTIALS;
    mockFile.mockReturnValue({
      save: mockSave,
      exists: mockExists,
      download: mockDownload,
    });
    adapter = new GcsArtifactStorageAdapter(
      new ConfigService<AllConfigType>({
        storage: {
          driver: 'gcs',
          outputDir: './output',
          gcsBucket: 'test-bucket',
          gcsPrefix: 'summaries/',
        },
      }),
    );
  });

  it('should save objects under the prefix and return a gs:// URI', async () => {
    mockSave.mockResolvedValue(undefined);

    const location = await adapter.writeJson('textbook_tropical/index.json', {
      ok: true,
    });

    expect(location).toBe(
      'gs://test-bucket/summaries/textbook_tropical/index.json',
    );
    expect(mockFile).toHaveBeenCalledWith(
      'summaries/textbook_tropical/index.json',
    );
    expect(mockSave).toHaveBeenCalledWith(
      Buffer.from('{\n  "ok": true\n}', 'utf-8'),
      expect.objectContaining({
        contentType: 'application/json',
        resumable: false,
      }),
    );
  });

  it('should hide driver errors behind a generic message', async () => {
    mockSave.mockRejectedValue(
      new Error('403 on gs://test-bucket/summaries/secret.md'),
    );

    await expect(adapter.writeText('secret.md', 'x')).rejects.toThrow(
      'Failed to write artifact to storage',
    );
  });

  it('should return null for missing objects', async () => {
    mockExists.mockResolvedValue([false]);

    await expect(adapter.readText('missing.md')).resolves.toBeNull();
    expect(mockDownload).not.toHaveBeenCalled();
  });

  it('should download existing objects as text', async () => {
    mockExists.mockResolvedValue([true]);
    mockDownload.mockResolvedValue([Buffer.from('# Summary', 'utf-8')]);

    await expect(adapter.readText('a.md')).resolves.toBe('# Summary');
  });

  it('should reject object names that climb out of the prefix', async () => {
    await expect(adapter.writeText('../other/x.md', 'x')).rejects.toThrow(
      'Artifact path escapes the output prefix',
    );
  });

  it('should report a missing bucket as unhealthy', async () => {
    mockBucketExists.mockResolvedValue([false]);

    await expect(adapter.healthCheck()).resolves.toEqual({
      status: 'unhealthy',
      driver: 'gcs',
      location: 'gs://test-bucket/summaries/',
      error: 'Bucket does not exist',
    });
  });
});

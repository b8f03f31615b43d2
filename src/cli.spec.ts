import { mkdtempSync, promises as fs, rmSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { CliOutput, USAGE, runCli } from './cli';

describe('clinical-summary CLI', () => {
  let workDir: string;
  let logs: string[];
  let errors: string[];
  const output: CliOutput = {
    log: (line) => logs.push(line),
    error: (line) => errors.push(line),
  };

  const validSummary = [
    '# Case Report Summary',
    '',
    '**Document:** dengue_case.pdf',
    '**Type:** case_report (confidence: 87%)',
    '**Processed:** 2024-03-01T10:00:00.000Z',
    '',
  ].join('\n');

  beforeEach(() => {
    workDir = mkdtempSync(path.join(tmpdir(), 'summary-cli-'));
    logs = [];
    errors = [];
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('validate', () => {
    it('should accept a well-formed summary', async () => {
      const file = path.join(workDir, 'good.md');
      await fs.writeFile(file, validSummary);

      await expect(runCli(['validate', file], output)).resolves.toBe(0);
      expect(logs).toEqual([`✅ ${file}`]);
    });

    it('should list issues and exit 1', async () => {
      const file = path.join(workDir, 'bad.md');
      await fs.writeFile(file, '# Case Report Summary\n\n**Document:** a.pdf\n');

      await expect(runCli(['validate', file], output)).resolves.toBe(1);
      expect(logs).toEqual([
        `❌ ${file}`,
        '  - Missing "Type" field',
        '  - Missing "Processed" field',
      ]);
    });

    it('should count missing files as invalid', async () => {
      const file = path.join(workDir, 'absent.md');

      await expect(runCli(['validate', file], output)).resolves.toBe(1);
      expect(errors).toEqual([`❌ ${file}: file not found`]);
    });
  });

  it('should print usage for unknown commands', async () => {
    await expect(runCli(['summarize'], output)).resolves.toBe(2);
    expect(errors).toEqual([USAGE]);
  });

  it('should print usage for unknown options', async () => {
    await expect(runCli(['validate', '--verbose'], output)).resolves.toBe(2);
    expect(errors[1]).toBe(USAGE);
  });

  describe('process', () => {
    it('should summarize records and write the master report', async () => {
      const outputDir = path.join(workDir, 'out');
      const record = path.join(workDir, 'dengue_case.json');
      const broken = path.join(workDir, 'broken.json');
      const notes = path.join(workDir, 'notes.txt');
      await fs.writeFile(
        record,
        JSON.stringify({
          documentName: 'dengue_case.pdf',
          pageCount: 1,
          pages: [
            { pageNumber: 1, text: 'A 34-year-old male presented with fever.' },
          ],
          classification: { documentType: 'case_report', confidence: 0.87 },
        }),
      );
      await fs.writeFile(broken, '{ not json');
      await fs.writeFile(notes, 'ignored');

      const code = await runCli(
        [
          'process',
          record,
          broken,
          notes,
          path.join(workDir, 'missing.json'),
          '--output',
          outputDir,
        ],
        output,
      );

      expect(code).toBe(0);
      expect(logs).toEqual([
        'Processed 1 document(s)',
        '  case_report: 1',
        `Master report: ${path.join(outputDir, 'MASTER_REPORT.md')}`,
      ]);
      expect(errors).toEqual([
        '⚠️  Skipping notes.txt: not a .json extraction record',
        '⚠️  Skipping missing.json: file not found',
        '❌ broken.json: Invalid JSON',
      ]);

      const index = JSON.parse(
        await fs.readFile(path.join(outputDir, 'document_index.json'), 'utf-8'),
      );
      expect(index.statistics).toEqual({
        totalProcessed: 1,
        byType: { case_report: 1 },
        totalFailed: 1,
      });
      await expect(
        fs.readFile(
          path.join(outputDir, 'case_report_dengue_case', 'dengue_case_summary.md'),
          'utf-8',
        ),
      ).resolves.toContain('**Document:** dengue_case.pdf');
    });
  });
});

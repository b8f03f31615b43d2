import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateDocumentSummaries1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');

    await queryRunner.createTable(
      new Table({
        name: 'document_summaries',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            default: 'uuid_generate_v4()',
          },
          {
            name: 'document_key',
            type: 'varchar',
            length: '12',
            isNullable: false,
          },
          {
            name: 'document_name',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'document_type',
            type: 'varchar',
            length: '50',
            isNullable: false,
          },
          {
            name: 'confidence',
            type: 'decimal',
            precision: 5,
            scale: 4,
            isNullable: false,
          },
          {
            name: 'status',
            type: 'varchar',
            length: '20',
            isNullable: false,
          },
          {
            name: 'page_count',
            type: 'int',
            isNullable: false,
          },
          // Summary fields (PHI)
          { name: 'demographics', type: 'jsonb', isNullable: true },
          { name: 'timeline', type: 'jsonb', isNullable: true },
          { name: 'diagnostics', type: 'jsonb', isNullable: true },
          { name: 'chapter_structure', type: 'jsonb', isNullable: true },
          { name: 'key_concepts', type: 'jsonb', isNullable: true },
          {
            name: 'extracted_images',
            type: 'jsonb',
            isNullable: false,
            default: "'[]'",
          },
          { name: 'extracted_data', type: 'jsonb', isNullable: true },
          {
            name: 'source_text',
            type: 'text',
            isNullable: false,
          },
          {
            name: 'chunk_count',
            type: 'int',
            isNullable: false,
            default: 0,
          },
          {
            name: 'artifact_folder',
            type: 'varchar',
            length: '320',
            isNullable: false,
          },
          {
            name: 'markdown_path',
            type: 'varchar',
            length: '500',
            isNullable: true,
          },
          {
            name: 'error_message',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'processed_at',
            type: 'timestamp',
            isNullable: true,
          },
          {
            name: 'created_at',
            type: 'timestamp',
            default: 'now()',
            isNullable: false,
          },
          {
            name: 'updated_at',
            type: 'timestamp',
            default: 'now()',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createIndices('document_summaries', [
      new TableIndex({
        name: 'IDX_document_summaries_document_key',
        columnNames: ['document_key'],
      }),
      new TableIndex({
        name: 'IDX_document_summaries_document_type',
        columnNames: ['document_type'],
      }),
      new TableIndex({
        name: 'IDX_document_summaries_status',
        columnNames: ['status'],
      }),
      new TableIndex({
        name: 'IDX_document_summaries_created_at',
        columnNames: ['created_at'],
      }),
    ]);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('document_summaries', true);
  }
}

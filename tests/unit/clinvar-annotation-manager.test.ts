/**
 * Unit tests for the ClinVar annotation orchestrator
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { ClassificationLookup, ClinVarAnnotationManager } from '../../src/clinvar/clinvar-annotation-manager';
import { ClinVarSummary } from '../../src/clinvar/clinvar-client';
import { VariantTable } from '../../src/table/variant-table';
import { MissingInputError } from '../../src/utils/errors';
import { SleepFn } from '../../src/utils/pacing';
import { CapturedLine, createRecordingLogger, messagesAt } from '../helpers';

type SearchFn = ClassificationLookup['search'];
type FetchRecordFn = ClassificationLookup['fetchRecord'];

const HGVS_A = 'NM_198578.4:c.6055G>A';
const HGVS_B = 'NM_000345.4:c.157G>A';

const PATHOGENIC: ClinVarSummary = {
  uid: '100001',
  germline_classification: {
    description: 'Pathogenic',
    review_status: 'reviewed by expert panel',
    trait_set: [{ trait_name: 'Parkinson disease 8', trait_xrefs: [{ db_source: 'OMIM', db_id: '607060' }] }],
  },
};

function validatedTable(hgvs: (string | null)[]): VariantTable {
  return VariantTable.fromRows(
    ['Patient_ID', '#CHROM', 'POS', 'REF', 'ALT', 'genome_build', 't_hgvs'],
    hgvs.map((value, i) => ['p1', '12', String(1000 + i), 'G', 'A', 'GRCh38', value ?? '']),
    'validated.csv'
  );
}

describe('ClinVarAnnotationManager', () => {
  let search: jest.Mock<SearchFn>;
  let fetchRecord: jest.Mock<FetchRecordFn>;
  let sleep: jest.Mock<SleepFn>;
  let lines: CapturedLine[];
  let manager: ClinVarAnnotationManager;

  beforeEach(() => {
    search = jest.fn<SearchFn>();
    fetchRecord = jest.fn<FetchRecordFn>();
    sleep = jest.fn<SleepFn>(async () => {});
    const recording = createRecordingLogger();
    lines = recording.lines;
    manager = new ClinVarAnnotationManager({ search, fetchRecord }, {
      requestDelayMs: 340,
      logger: recording.logger,
      sleep,
      now: () => 0,
    });
  });

  it('refuses a table without t_hgvs before any lookup', async () => {
    const table = VariantTable.fromRows(['#CHROM', 'POS', 'REF', 'ALT'], [['12', '40340400', 'G', 'A']], 'raw.csv');

    await expect(manager.annotate(table)).rejects.toBeInstanceOf(MissingInputError);

    expect(search).not.toHaveBeenCalled();
    expect(messagesAt(lines, 'error')).toEqual(["Input is missing required column 't_hgvs'"]);
    expect(manager.status).toBe('not_started');
  });

  it('writes the classification of the matching ClinVar record', async () => {
    search.mockResolvedValue(['100001']);
    fetchRecord.mockResolvedValue(PATHOGENIC);
    const table = validatedTable([HGVS_A]);

    const summary = await manager.annotate(table);

    expect(summary).toEqual({ total: 1, succeeded: 1, failed: 0, skipped: 0, elapsedMs: 0 });
    expect(search).toHaveBeenCalledWith(HGVS_A);
    expect(fetchRecord).toHaveBeenCalledWith('100001');
    const [record] = table.records;
    expect(record.clinvar_uid).toBe('100001');
    expect(record.classification).toBe('Pathogenic');
    expect(record.review_status_text).toBe('reviewed by expert panel');
    expect(record.star_rating).toBe(3);
    expect(record.disease_name).toBe('Parkinson disease 8');
    expect(record.disease_mim).toBe('607060');
    expect(manager.status).toBe('completed');
  });

  it('waits the fixed delay after every request', async () => {
    search.mockResolvedValue(['100001']);
    fetchRecord.mockResolvedValue(PATHOGENIC);

    await manager.annotate(validatedTable([HGVS_A, HGVS_B]));

    expect(sleep.mock.calls).toEqual([[340], [340], [340], [340]]);
  });

  it('skips rows without t_hgvs with a warning', async () => {
    const table = validatedTable([null]);

    const summary = await manager.annotate(table);

    expect(summary.skipped).toBe(1);
    expect(search).not.toHaveBeenCalled();
    expect(messagesAt(lines, 'warn')).toEqual(['Row 0 has no t_hgvs value, skipping ClinVar lookup']);
    expect(table.records[0].clinvar_uid).toBeNull();
  });

  it('leaves the row empty when ClinVar has no match', async () => {
    search.mockResolvedValue([]);
    const table = validatedTable([HGVS_A]);

    const summary = await manager.annotate(table);

    expect(summary).toEqual({ total: 1, succeeded: 0, failed: 0, skipped: 1, elapsedMs: 0 });
    expect(fetchRecord).not.toHaveBeenCalled();
    expect(messagesAt(lines, 'info')).toContain(`No ClinVar UID found for ${HGVS_A}`);
    expect(table.records[0].classification).toBeNull();
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('clears annotation fields left over from an earlier run', async () => {
    search.mockResolvedValue([]);
    const table = VariantTable.fromRows(
      ['Patient_ID', '#CHROM', 'POS', 'REF', 'ALT', 't_hgvs', 'clinvar_uid', 'classification', 'star_rating', 'disease_mim'],
      [
        ['p1', '12', '1000', 'G', 'A', HGVS_A, '999', 'Benign', '2', '607060'],
        ['p1', '12', '1001', 'G', 'A', '', '998', 'Likely benign', '1', ''],
      ],
      'anno_data.csv'
    );

    const summary = await manager.annotate(table);

    expect(summary.skipped).toBe(2);
    for (const record of table.records) {
      expect(record.clinvar_uid).toBeNull();
      expect(record.classification).toBeNull();
      expect(record.star_rating).toBeNull();
      expect(record.disease_mim).toBeNull();
    }
  });

  it('annotates matched rows and leaves unmatched rows empty in one batch', async () => {
    search.mockImplementation(async hgvs => (hgvs === HGVS_A ? ['100001'] : []));
    fetchRecord.mockResolvedValue(PATHOGENIC);
    const table = validatedTable([HGVS_A, HGVS_B]);

    await expect(manager.annotate(table)).resolves.toEqual({ total: 2, succeeded: 1, failed: 0, skipped: 1, elapsedMs: 0 });

    expect(table.records[0].clinvar_uid).toBe('100001');
    expect(table.records[1].clinvar_uid).toBeNull();
    expect(table.records[1].classification).toBeNull();
  });

  it('uses the first of several UIDs and logs the candidates', async () => {
    search.mockResolvedValue(['100001', '100002']);
    fetchRecord.mockResolvedValue(PATHOGENIC);
    const table = validatedTable([HGVS_A]);

    await manager.annotate(table);

    expect(fetchRecord).toHaveBeenCalledTimes(1);
    expect(fetchRecord).toHaveBeenCalledWith('100001');
    expect(table.records[0].clinvar_uid).toBe('100001');
    expect(messagesAt(lines, 'info')).toContain(`Found ClinVar UIDs 100001, 100002 for ${HGVS_A}, using 100001`);
  });

  it('keeps the UID of a row whose summary lookup threw and carries on', async () => {
    search.mockResolvedValueOnce(['100001']).mockResolvedValueOnce(['100002']);
    fetchRecord.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce(PATHOGENIC);
    const table = validatedTable([HGVS_A, HGVS_B]);

    const summary = await manager.annotate(table);

    expect(summary).toEqual({ total: 2, succeeded: 1, failed: 1, skipped: 0, elapsedMs: 0 });
    expect(table.records[0].clinvar_uid).toBe('100001');
    expect(table.records[0].classification).toBeNull();
    expect(table.records[1].classification).toBe('Pathogenic');
    expect(messagesAt(lines, 'error')).toEqual([`Failed to annotate row 0 (${HGVS_A}): socket hang up`]);
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it('treats an empty summary document as a record without classification', async () => {
    search.mockResolvedValue(['100001']);
    fetchRecord.mockResolvedValue({});
    const table = validatedTable([HGVS_A]);

    const summary = await manager.annotate(table);

    expect(summary.succeeded).toBe(1);
    expect(table.records[0].clinvar_uid).toBe('100001');
    expect(table.records[0].star_rating).toBeNull();
  });

  it('adds the annotation columns to the table', async () => {
    search.mockResolvedValue([]);
    const table = validatedTable([HGVS_A]);

    await manager.annotate(table);

    expect(table.columns.slice(-6)).toEqual([
      'clinvar_uid', 'classification', 'review_status_text', 'star_rating', 'disease_name', 'disease_mim',
    ]);
  });

  it('reports progress with the HGVS of each row', async () => {
    search.mockResolvedValue([]);
    const labels: string[] = [];
    manager.on('progress', (event: { label: string }) => labels.push(event.label));

    await manager.annotate(validatedTable([HGVS_A, null]));

    expect(labels).toEqual([HGVS_A, '(no HGVS)']);
  });
});

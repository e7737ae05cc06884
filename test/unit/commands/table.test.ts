import { DEFAULT_COMMAND_TABLE } from '../../../src/commands/table.js';
import { createSamtools } from '../../../src/samtools.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { FakeExecutor, outcome } from '../../helpers/fake-executor.js';

describe('DEFAULT_COMMAND_TABLE', () => {
  it('declares every supported subcommand', () => {
    expect(Object.keys(DEFAULT_COMMAND_TABLE)).toEqual([
      'view', 'sort', 'mpileup', 'depth', 'faidx', 'tview', 'index', 'idxstats', 'fixmate', 'flagstat',
      'calmd', 'merge', 'rmdup', 'reheader', 'cat', 'targetcut', 'phase', 'samimport', 'bam2fq',
    ]);
  });

  it('maps samimport to the import subcommand', () => {
    expect(DEFAULT_COMMAND_TABLE.samimport.identifier).toBe('import');
  });
});

describe('createSamtools', () => {
  it('parses idxstats output by default and returns text with raw', async () => {
    const executor = new FakeExecutor(outcome({ stdout: 'chr1\t100\t9\t1\n' }));
    const samtools = createSamtools({ config: DEFAULT_CONFIG, executor }).namespace();

    await expect(samtools['idxstats']('in.bam')).resolves.toEqual([
      { reference: 'chr1', length: 100, mapped: 9, unmapped: 1 },
    ]);
    await expect(samtools['idxstats'].withOptions({ raw: true }, 'in.bam')).resolves.toBe('chr1\t100\t9\t1\n');
  });

  it('returns mpileup output as text, whatever columns it carries', async () => {
    const executor = new FakeExecutor(outcome({ stdout: 'chr1\t1\tA\t1\t.\tI\t60\n' }));
    const samtools = createSamtools({ config: DEFAULT_CONFIG, executor }).namespace();

    await expect(samtools['mpileup']('-s', 'in.bam')).resolves.toBe('chr1\t1\tA\t1\t.\tI\t60\n');
    await expect(samtools['mpileup']('in.bam')).resolves.toBe('chr1\t1\tA\t1\t.\tI\t60\n');
  });

  it('returns binary mpileup output as the captured bytes', async () => {
    const bcf = Buffer.from([31, 139, 8, 4, 0, 0, 0, 0, 0, 255]);
    const executor = new FakeExecutor(outcome({ stdout: bcf }));
    const samtools = createSamtools({ config: DEFAULT_CONFIG, executor }).namespace();

    await expect(samtools['mpileup']('-g', 'in.bam')).resolves.toBe(bcf);
  });

  it('returns flagstat text unchanged when it has no "<passed> + <failed>" lines', async () => {
    const executor = new FakeExecutor(outcome({ stderrLines: ['[bam_index_load] foo'], stdout: '120 total\n' }));
    const samtools = createSamtools({ config: DEFAULT_CONFIG, executor }).namespace();

    await expect(samtools['flagstat']('in.bam')).resolves.toBe('120 total\n');
    expect(samtools['flagstat'].getMessages()).toEqual(['[bam_index_load] foo']);
  });

  it('parses default flagstat output and returns the tsv and json layouts as text', async () => {
    const tsv = '120\t0\ttotal (QC-passed reads + QC-failed reads)\n';
    const json = '{\n "QC-passed reads": {\n  "total": 120\n }\n}\n';
    const executor = new FakeExecutor(
      outcome({ stdout: '120 + 0 in total (QC-passed reads + QC-failed reads)\n118 + 0 mapped (98.33% : N/A)\n' }),
      outcome({ stdout: tsv }),
      outcome({ stdout: json }),
    );
    const samtools = createSamtools({ config: DEFAULT_CONFIG, executor }).namespace();

    await expect(samtools['flagstat']('in.bam')).resolves.toEqual({
      total: { passed: 120, failed: 0 },
      mapped: { passed: 118, failed: 0 },
    });
    await expect(samtools['flagstat']('-O', 'tsv', 'in.bam')).resolves.toBe(tsv);
    await expect(samtools['flagstat']('-O', 'json', 'in.bam')).resolves.toBe(json);
  });

  it('skips the depth header written under -H', async () => {
    const executor = new FakeExecutor(outcome({ stdout: '#CHROM\tPOS\tin.bam\nchr1\t1\t4\nchr1\t2\t5\n' }));
    const samtools = createSamtools({ config: DEFAULT_CONFIG, executor }).namespace();

    await expect(samtools['depth']('-H', 'in.bam')).resolves.toEqual([
      { reference: 'chr1', position: 1, depths: [4] },
      { reference: 'chr1', position: 2, depths: [5] },
    ]);
  });

  it('returns idxstats text unchanged when a line does not have four fields', async () => {
    const executor = new FakeExecutor(outcome({ stdout: 'chr1\t100\t9\n' }));
    const samtools = createSamtools({ config: DEFAULT_CONFIG, executor }).namespace();

    await expect(samtools['idxstats']('in.bam')).resolves.toBe('chr1\t100\t9\n');
  });

  it('adds configured benign prefixes to the defaults', async () => {
    const config = { ...DEFAULT_CONFIG, diagnostics: { benign_prefixes: ['[W::'], replace_defaults: false } };
    const executor = new FakeExecutor(outcome({ stderrLines: ['[W::bam_hdr_read] EOF marker is absent', '[bam_index_load] x'], stdout: 'ok' }));
    const samtools = createSamtools({ config, executor }).namespace();

    await expect(samtools['view']('in.bam')).resolves.toBe('ok');
  });

  it('drops the default prefixes when told to replace them', async () => {
    const config = { ...DEFAULT_CONFIG, diagnostics: { benign_prefixes: ['[W::'], replace_defaults: true } };
    const executor = new FakeExecutor(outcome({ stderrLines: ['[bam_index_load] x'], stdout: 'ok' }));
    const samtools = createSamtools({ config, executor }).namespace();

    await expect(samtools['view']('in.bam')).rejects.toThrow('[bam_index_load] x');
  });
});

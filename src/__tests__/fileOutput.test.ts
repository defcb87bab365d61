import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ScatterPlot } from '../plots/ScatterPlot';
import { HistogramPlot } from '../plots/HistogramPlot';
import { SubplotGrid } from '../plots/SubplotGrid';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe('file output', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'plotframe-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a PNG for a scatter plot', async () => {
    const plot = new ScatterPlot();
    plot.addSeries([1, 2, 3, 4, 5], [2, 4, 6, 8, 10], 'doubled');
    plot.setLabels('Doubling', 'x', 'y');
    const path = join(dir, 'scatter.png');

    await expect(plot.savePng(path)).resolves.toBe(true);
    const bytes = await readFile(path);
    expect(Array.from(bytes.subarray(0, 8))).toEqual(PNG_SIGNATURE);
  }, 20000);

  it('writes an empty plot', async () => {
    const path = join(dir, 'empty.png');
    await expect(new ScatterPlot().savePng(path)).resolves.toBe(true);
    expect((await stat(path)).size).toBeGreaterThan(0);
  }, 20000);

  it('writes a subplot grid', async () => {
    const grid = new SubplotGrid(1, 2);
    grid.setMainTitle('Overview');
    grid.getSubplot(0, 0).addSeries([0, 1], [0, 1]);
    grid.getSubplot(0, 1, 'histogram').addHistogram([1, 2, 2, 3]);
    const path = join(dir, 'grid.png');
    await expect(grid.savePng(path)).resolves.toBe(true);
  }, 20000);

  it('writes the same SVG on every save', async () => {
    const plot = new HistogramPlot();
    plot.addDiscreteHistogram([2, 5, 1], ['a', 'b', 'c']);
    const first = join(dir, 'first.svg');
    const second = join(dir, 'second.svg');
    await expect(plot.saveSvg(first)).resolves.toBe(true);
    await expect(plot.saveSvg(second)).resolves.toBe(true);
    expect(await readFile(second, 'utf8')).toBe(await readFile(first, 'utf8'));
  });

  it('resolves false when the destination cannot be written', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const plot = new ScatterPlot();
    plot.addSeries([1], [1]);
    await expect(plot.savePng(join(dir, 'missing', 'plot.png'))).resolves.toBe(false);
    await expect(plot.saveSvg(join(dir, 'missing', 'plot.svg'))).resolves.toBe(false);
    expect(warn).toHaveBeenCalledTimes(2);
  }, 20000);
});

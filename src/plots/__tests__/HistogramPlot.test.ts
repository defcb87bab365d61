import { describe, it, expect, vi, afterEach } from 'vitest';
import { HistogramPlot } from '../HistogramPlot';
import { InvalidArgumentError } from '../../errors';
import { createRecordingSurface, drawnText } from '../../__tests__/helpers/recordingSurface';

const values = [1, 2, 2, 3, 3, 3, 4, 4, 4, 4];

describe('HistogramPlot - continuous data', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('bins values and bounds y from zero to the tallest bar', () => {
    const plot = new HistogramPlot();
    plot.addHistogram(values, 3);
    const bounds = plot.getBounds();
    expect(bounds.minX).toBeCloseTo(0.94);
    expect(bounds.maxX).toBeCloseTo(4.06);
    expect(bounds.minY).toBe(0);
    expect(bounds.maxY).toBeCloseTo(7.35);
  });

  it('accepts a name and a color', () => {
    const plot = new HistogramPlot();
    plot.addHistogram(values, 'scores', 'red', 2);
    expect(plot.renderTo(createRecordingSurface()).legendEntries).toEqual([
      { label: 'scores', color: [1, 0, 0, 0.8], symbol: 'bar' },
    ]);
  });

  it('uses the default bin count when none is given', () => {
    const plot = new HistogramPlot();
    plot.setDefaultBinCount(2);
    plot.addHistogram([0, 1, 2, 3], 'two bins');
    plot.setLegendEnabled(false);
    const surface = createRecordingSurface();
    plot.renderTo(surface);
    expect(surface.fill).toHaveBeenCalledTimes(2);
    expect(plot.getDefaultBinCount()).toBe(2);
  });

  it('warns and adds nothing for empty input', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const plot = new HistogramPlot();
    plot.addHistogram([]);
    expect(plot.getSeriesCount()).toBe(0);
    expect(warn).toHaveBeenCalledWith('plotframe: addHistogram: no values given, nothing added.');
  });

  it('rejects non-finite values and invalid bin counts', () => {
    const plot = new HistogramPlot();
    expect(() => plot.addHistogram([1, Number.NaN])).toThrow(InvalidArgumentError);
    expect(() => plot.addHistogram([1, 2], -3)).toThrow(InvalidArgumentError);
    expect(() => plot.setDefaultBinCount(1.5)).toThrow(InvalidArgumentError);
  });

  it('labels the y axis Frequency by default', () => {
    const plot = new HistogramPlot();
    expect(plot.getYLabel()).toBe('Frequency');
    plot.setYLabel('Count');
    plot.clear();
    expect(plot.getYLabel()).toBe('Frequency');
    const surface = createRecordingSurface();
    plot.renderTo(surface);
    expect(drawnText(surface)).toContain('Frequency');
  });
});

describe('HistogramPlot - discrete data', () => {
  it('names categories and colors each bar from the palette', () => {
    const plot = new HistogramPlot();
    plot.addDiscreteHistogram([3, 1, 2]);
    const result = plot.renderTo(createRecordingSurface());
    expect(result.xTicks.map((t) => t.label)).toEqual(['Category 1', 'Category 2', 'Category 3']);
    expect(result.legendEntries.map((e) => e.color)).toEqual([
      [0, 0, 1, 0.8],
      [1, 0, 0, 0.8],
      [0, 0.7, 0, 0.8],
    ]);
  });

  it('accepts category names and colors', () => {
    const plot = new HistogramPlot();
    plot.addDiscreteHistogram([1, 2], ['cats', 'dogs'], ['orange', 'purple']);
    expect(plot.renderTo(createRecordingSurface()).legendEntries).toEqual([
      { label: 'cats', color: [1, 0.5, 0, 0.8], symbol: 'bar' },
      { label: 'dogs', color: [0.6, 0.2, 0.8, 0.8], symbol: 'bar' },
    ]);
  });

  it('rejects fractional counts and mismatched names', () => {
    const plot = new HistogramPlot();
    expect(() => plot.addDiscreteHistogram([1, 2.5])).toThrow(InvalidArgumentError);
    expect(() => plot.addDiscreteHistogram([1, 2], ['only'])).toThrow(
      'addDiscreteHistogram: expected 2 category name(s), one per count (got 1)'
    );
  });

  it('keeps continuous and discrete data apart', () => {
    const plot = new HistogramPlot();
    plot.addHistogram(values);
    expect(() => plot.addDiscreteHistogram([1, 2])).toThrow(InvalidArgumentError);
    expect(plot.getSeriesCount()).toBe(1);
  });

  it('leaves the color rotation untouched when an add is rejected', () => {
    const plot = new HistogramPlot();
    plot.addHistogram(values, 'a');
    expect(() => plot.addDiscreteHistogram([1, 2, 3])).toThrow(InvalidArgumentError);
    plot.addHistogram(values, 'b');
    expect(plot.renderTo(createRecordingSurface()).legendEntries.map((e) => e.color)).toEqual([
      [0, 0, 1, 0.8],
      [1, 0, 0, 0.8],
    ]);

    const withLine = new HistogramPlot();
    withLine.addVerticalLine(2, 'cut');
    const lineColor = withLine.getReferenceLines()[0].color;
    expect(() => withLine.addDiscreteHistogram([4, 5])).toThrow(InvalidArgumentError);
    withLine.addHistogram(values, 'kept');
    expect(withLine.renderTo(createRecordingSurface()).legendEntries.map((e) => e.color)).toEqual([
      [1, 0, 0, 0.8],
      lineColor,
    ]);
  });

  it('keeps vertical lines off categorical axes', () => {
    const discrete = new HistogramPlot();
    discrete.addDiscreteHistogram([1, 2]);
    expect(() => discrete.addVerticalLine(0)).toThrow(InvalidArgumentError);
    discrete.addHorizontalLine(1.5, 'mean');
    expect(discrete.getReferenceLineCount()).toBe(1);

    const withLine = new HistogramPlot();
    withLine.addVerticalLine(0);
    expect(() => withLine.addDiscreteHistogram([1, 2])).toThrow(InvalidArgumentError);
  });
});

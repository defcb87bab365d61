import { describe, it, expect } from 'vitest';
import { LinePlot } from '../LinePlot';
import { InvalidArgumentError } from '../../errors';
import { createRecordingSurface } from '../../__tests__/helpers/recordingSurface';

describe('LinePlot', () => {
  it('strokes each series as one polyline', () => {
    const plot = new LinePlot();
    plot.addLine([0, 1, 2], [0, 1, 4], 'curve');
    plot.setLegendEnabled(false);
    const surface = createRecordingSurface();
    plot.renderTo(surface);
    expect(surface.curveTo).not.toHaveBeenCalled();
    expect(plot.toSvg()).toContain('stroke-width="2"');
  });

  it('applies the default line width to new series', () => {
    const plot = new LinePlot();
    plot.setDefaultLineWidth(3);
    plot.addLine([0, 1], [0, 1]);
    expect(plot.getDefaultLineWidth()).toBe(3);
    expect(plot.toSvg()).toContain('stroke-width="3"');
  });

  it('rejects non-positive line widths', () => {
    expect(() => new LinePlot().setDefaultLineWidth(0)).toThrow(InvalidArgumentError);
  });

  it('dashes lines in the dashed style', () => {
    const plot = new LinePlot();
    plot.setDefaultLineStyle('dashed');
    plot.addLine([0, 1], [0, 1]);
    expect(plot.toSvg()).toContain('stroke-dasharray="10 5"');
  });

  it('adds markers when enabled', () => {
    const plot = new LinePlot();
    plot.addLine([0, 1, 2], [0, 1, 4]);
    plot.setShowMarkers(true);
    plot.setLegendEnabled(false);
    const surface = createRecordingSurface();
    plot.renderTo(surface);
    expect(surface.curveTo).toHaveBeenCalledTimes(3 * 4);
  });

  it('draws a marker for a single-point series', () => {
    const plot = new LinePlot();
    plot.addLine([1], [1]);
    plot.setLegendEnabled(false);
    const surface = createRecordingSurface();
    plot.renderTo(surface);
    expect(surface.curveTo).toHaveBeenCalledTimes(4);
  });

  it('shows line symbols in the legend', () => {
    const plot = new LinePlot();
    plot.addLine([0, 1], [0, 1], 'trend');
    expect(plot.renderTo(createRecordingSurface()).legendEntries[0].symbol).toBe('line');
  });
});

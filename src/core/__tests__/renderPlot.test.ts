import { describe, it, expect, vi } from 'vitest';
import type { Series } from '../../config/types';
import type { PlotDrawStyle } from '../../renderers/types';
import { resolvePlotOptions } from '../../config/OptionResolver';
import { RENDER_STAGES, renderPlot, type PlotRenderInput } from '../renderPlot';
import { createRecordingSurface, drawnText } from '../../__tests__/helpers/recordingSurface';

const scatterStyle: PlotDrawStyle = { plotKind: 'scatter', markerType: 'circle', lineStyle: 'solid', showMarkers: true };

const dataSeries: Series = {
  kind: 'plain',
  name: 'data',
  points: [1, 2, 3, 4, 5].map((x) => ({ x, y: 2 * x })),
  style: { pointSize: 4, lineWidth: 2, color: [0, 0, 1, 0.8], label: 'data' },
};

const makeInput = (overrides: Partial<PlotRenderInput> = {}): PlotRenderInput => ({
  options: resolvePlotOptions(),
  title: '',
  xLabel: '',
  yLabel: '',
  series: [],
  referenceLines: [],
  manualBounds: null,
  legendEnabled: true,
  hiddenLegendLabels: new Set<string>(),
  style: scatterStyle,
  ...overrides,
});

describe('renderPlot - stages', () => {
  it('runs every stage in order', () => {
    const onStage = vi.fn();
    const result = renderPlot(makeInput({ series: [dataSeries] }), createRecordingSurface(), undefined, { onStage });
    expect(onStage.mock.calls.map((call) => call[0])).toEqual([...RENDER_STAGES]);
    expect(result.stages).toEqual([...RENDER_STAGES]);
  });

  it('issues the same drawing calls for the same input', () => {
    const first = createRecordingSurface();
    const second = createRecordingSurface();
    const input = makeInput({ series: [dataSeries], title: 'Twice' });
    renderPlot(input, first);
    renderPlot(input, second);
    expect(second.drawText.mock.calls).toEqual(first.drawText.mock.calls);
    expect(second.moveTo.mock.calls).toEqual(first.moveTo.mock.calls);
    expect(second.lineTo.mock.calls).toEqual(first.lineTo.mock.calls);
    expect(second.setColor.mock.calls).toEqual(first.setColor.mock.calls);
  });
});

describe('renderPlot - empty plots', () => {
  it('draws fallback axes and a centered placeholder', () => {
    const surface = createRecordingSurface();
    const result = renderPlot(makeInput(), surface);

    expect(result.bounds.isEmpty).toBe(true);
    expect(result.xTicks.map((t) => t.label)).toEqual(['0', '0.2', '0.4', '0.6', '0.8', '1']);
    expect(result.legendEntries).toEqual([]);

    const placeholder = surface.drawText.mock.calls.find((call) => call[0] === 'Empty plot');
    expect(placeholder).toEqual(['Empty plot', { x: 365, y: 290 }, 16, { anchor: 'middle', baseline: 'middle' }]);
  });
});

describe('renderPlot - data', () => {
  it('labels ticks inside the padded bounds', () => {
    const result = renderPlot(makeInput({ series: [dataSeries] }), createRecordingSurface());
    expect(result.bounds.source).toBe('data');
    expect(result.xTicks.map((t) => t.label)).toEqual(['1', '2', '3', '4', '5']);
    expect(result.yTicks.map((t) => t.label)).toEqual(['2', '4', '6', '8', '10']);
  });

  it('draws the tick labels it returns', () => {
    const surface = createRecordingSurface();
    const result = renderPlot(makeInput({ series: [dataSeries] }), surface);
    const text = drawnText(surface);
    for (const tick of [...result.xTicks, ...result.yTicks]) {
      expect(text).toContain(tick.label);
    }
  });

  it('draws one marker per point on scatter plots', () => {
    const surface = createRecordingSurface();
    renderPlot(makeInput({ series: [dataSeries], legendEnabled: false }), surface);
    // Circles are four curves each.
    expect(surface.curveTo).toHaveBeenCalledTimes(5 * 4);
  });

  it('draws the title last', () => {
    const surface = createRecordingSurface();
    renderPlot(makeInput({ series: [dataSeries], title: 'My plot' }), surface);
    const calls = surface.drawText.mock.calls;
    expect(calls[calls.length - 1]).toEqual(['My plot', { x: 400, y: 25 }, 16, { anchor: 'middle', weight: 'bold' }]);
  });

  it('builds legend entries unless the legend is disabled', () => {
    const shown = renderPlot(makeInput({ series: [dataSeries] }), createRecordingSurface());
    expect(shown.legendEntries).toEqual([{ label: 'data', color: [0, 0, 1, 0.8], symbol: 'circle' }]);

    const surface = createRecordingSurface();
    const hidden = renderPlot(makeInput({ series: [dataSeries], legendEnabled: false }), surface);
    expect(hidden.legendEntries).toEqual([]);
    expect(drawnText(surface)).not.toContain('data');
  });

  it('places the local layout through the viewport', () => {
    const surface = createRecordingSurface(1000, 1000);
    renderPlot(makeInput({ series: [dataSeries], title: 'Cell' }), surface, { offsetX: 10, offsetY: 20, scale: 0.5 });
    const calls = surface.drawText.mock.calls;
    expect(calls[calls.length - 1]).toEqual(['Cell', { x: 210, y: 32.5 }, 8, { anchor: 'middle', weight: 'bold' }]);
  });

  it('labels discrete histogram slots with category names', () => {
    const result = renderPlot(
      makeInput({
        series: [
          {
            kind: 'histogram-discrete',
            name: 'Series 1',
            categories: ['a', 'b', 'c'],
            counts: [1, 2, 3],
            colors: [
              [0, 0, 1, 0.8],
              [1, 0, 0, 0.8],
              [0, 0.7, 0, 0.8],
            ],
            style: { pointSize: 4, lineWidth: 2, color: [0, 0, 1, 0.8], label: 'Series 1' },
          },
        ],
        style: { ...scatterStyle, plotKind: 'histogram', showMarkers: false },
      }),
      createRecordingSurface()
    );
    expect(result.xTicks.map((t) => t.label)).toEqual(['a', 'b', 'c']);
    expect(result.legendEntries.map((e) => e.label)).toEqual(['a', 'b', 'c']);
  });
});

import { describe, it, expect } from 'vitest';
import type { PlotDrawStyle, RenderContext } from '../types';
import { renderSeries } from '../renderSeries';
import { resolveTheme } from '../../config/OptionResolver';
import { defaultMargins } from '../../config/defaults';
import { createCoordinateTransform } from '../../core/transform/createCoordinateTransform';
import { OUTLIER_COLOR, clusterColor } from '../../core/color/createColorAssigner';
import { buildClusterSeries } from '../../data/buildSeries';
import { withAlpha } from '../../utils/colors';
import { createRecordingSurface, type RecordingSurface } from '../../__tests__/helpers/recordingSurface';

const scatter: PlotDrawStyle = { plotKind: 'scatter', markerType: 'circle', lineStyle: 'solid', showMarkers: true };

const contextFor = (surface: RecordingSurface): RenderContext => ({
  surface,
  transform: createCoordinateTransform({
    bounds: { minX: 0, maxX: 3, minY: 0, maxY: 3 },
    width: 800,
    height: 600,
    margins: defaultMargins,
  }),
  theme: resolveTheme(),
});

// Outliers come last in input order.
const clusters = buildClusterSeries(
  {
    name: 'groups',
    points: [
      { x: 0.5, y: 0.5 },
      { x: 1, y: 1 },
      { x: 2, y: 2 },
      { x: 1.5, y: 2.5 },
      { x: 2.5, y: 0.5 },
    ],
    labels: [0, 0, 1, -1, -1],
    pointSize: 3,
    alpha: 0.8,
  },
  'addClusters'
);

describe('renderSeries - clusters', () => {
  it('draws outlier crosses before cluster circles', () => {
    const surface = createRecordingSurface();
    renderSeries(contextFor(surface), [clusters], scatter);

    expect(surface.stroke).toHaveBeenCalledTimes(2);
    expect(surface.fill).toHaveBeenCalledTimes(3);

    const lastOutlierStroke = Math.max(...surface.stroke.mock.invocationCallOrder);
    const firstClusterFill = Math.min(...surface.fill.mock.invocationCallOrder);
    expect(lastOutlierStroke).toBeLessThan(firstClusterFill);
  });

  it('colors outliers red and clusters from the cluster palette', () => {
    const surface = createRecordingSurface();
    renderSeries(contextFor(surface), [clusters], scatter);

    const colors = surface.setColor.mock.calls.map((call) => call[0]);
    expect(colors[0]).toEqual(OUTLIER_COLOR);
    expect(colors).toContainEqual(withAlpha(clusterColor(0), 0.8));
    expect(colors).toContainEqual(withAlpha(clusterColor(1), 0.8));
  });
});

import type { RenderContext } from './types';
import { axisLayout, typography } from '../config/defaults';

export function renderTitle(ctx: RenderContext, title: string): void {
  if (title.length === 0) return;
  const { surface, transform, theme } = ctx;

  surface.setColor(theme.textColor);
  surface.drawText(
    title,
    transform.toDevice(transform.width / 2, axisLayout.titleBaseline),
    theme.fontSize * typography.titleScale * transform.scale,
    { anchor: 'middle', weight: 'bold' }
  );
}

/**
 * Standalone HTML page wrapping one chart.
 */

import type { ReactNode } from 'react';

interface PlotDocumentProps {
  title: string;
  children: ReactNode;
}

export function PlotFigure({ title, children }: PlotDocumentProps) {
  return (
    <figure className="plot-figure" style={{ margin: 0 }}>
      <figcaption style={{ fontSize: 18, fontWeight: 600, textAlign: 'center', marginBottom: 12 }}>
        {title}
      </figcaption>
      <div style={{ display: 'flex', alignItems: 'flex-start', gap: 20 }}>{children}</div>
    </figure>
  );
}

export function PlotDocument({ title, children }: PlotDocumentProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
      </head>
      <body style={{ fontFamily: 'Arial, sans-serif', margin: 24, background: '#ffffff' }}>
        <PlotFigure title={title}>{children}</PlotFigure>
      </body>
    </html>
  );
}

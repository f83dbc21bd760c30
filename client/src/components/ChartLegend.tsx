/**
 * Static legend rendered beside a chart: a short swatch per series.
 */

export interface LegendItem {
  label: string;
  color: string;
  variant?: 'line' | 'dashed' | 'band' | 'point';
}

interface ChartLegendProps {
  items: LegendItem[];
  title?: string;
}

function Swatch({ color, variant = 'line' }: Omit<LegendItem, 'label'>) {
  if (variant === 'point') {
    return (
      <span
        style={{
          display: 'inline-block',
          width: 10,
          height: 10,
          borderRadius: '50%',
          border: '1px solid #000000',
          backgroundColor: color
        }}
      />
    );
  }
  if (variant === 'band') {
    return <span style={{ display: 'inline-block', width: 24, height: 10, backgroundColor: color }} />;
  }
  return (
    <span
      style={{
        display: 'inline-block',
        width: 24,
        height: 0,
        borderTop: `3px ${variant === 'dashed' ? 'dashed' : 'solid'} ${color}`
      }}
    />
  );
}

export function ChartLegend({ items, title }: ChartLegendProps) {
  return (
    <div className="chart-legend" style={{ fontSize: 12, minWidth: 160 }}>
      {title && <div style={{ fontWeight: 600, marginBottom: 6 }}>{title}</div>}
      <ul style={{ listStyle: 'none', margin: 0, padding: 0 }}>
        {items.map((item) => (
          <li
            key={item.label}
            data-series={item.label}
            style={{ display: 'flex', alignItems: 'center', gap: 8, marginBottom: 6 }}
          >
            <Swatch color={item.color} variant={item.variant} />
            <span>{item.label}</span>
          </li>
        ))}
      </ul>
    </div>
  );
}

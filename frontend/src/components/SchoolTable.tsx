import type { DashboardModel } from '../types';

interface SchoolTableProps {
  model: DashboardModel;
  exportHref: string;
}

const cell = { padding: '4px 8px', borderBottom: '1px solid #eee', textAlign: 'left' as const };

export default function SchoolTable({ model, exportHref }: SchoolTableProps) {
  return (
    <div style={{ padding: 16, overflow: 'auto', height: '100%', boxSizing: 'border-box', fontSize: 13 }}>
      <h2 style={{ fontSize: 16, margin: '0 0 8px 0' }}>Schools</h2>
      <table style={{ borderCollapse: 'collapse', width: '100%' }}>
        <thead>
          <tr>
            {['Name', 'Municipality', 'Address', 'Distance (km)', 'Cycling distance (km)', 'Band', 'General', 'Montessori', 'Support'].map((h) => (
              <th key={h} style={{ ...cell, background: '#f5f5f5' }}>{h}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {model.table.map((r, i) => (
            <tr key={`${r.name}-${i}`}>
              <td style={cell}>{r.name}</td>
              <td style={cell}>{r.municipality}</td>
              <td style={cell}>{r.address}</td>
              <td style={cell}>{r.distanceKm}</td>
              <td style={cell}>{r.cyclingDistanceKm ?? '?'}</td>
              <td style={cell}>{r.band}</td>
              <td style={cell}>{r.generalSeats}</td>
              <td style={cell}>{r.montessoriSeats}</td>
              <td style={cell}>{r.supportSeats}</td>
            </tr>
          ))}
        </tbody>
      </table>

      <h2 style={{ fontSize: 16, margin: '16px 0 8px 0' }}>Statistics by band</h2>
      {model.statistics.length === 0 && <div style={{ color: '#666' }}>No schools in the selected bands.</div>}
      {model.statistics.map((s) => (
        <div key={s.band} style={{ marginBottom: 4 }}>
          <b>{s.band}</b>: {s.count} schools (min: {s.minKm} km, max: {s.maxKm} km, mean: {s.meanKm} km)
        </div>
      ))}

      <a href={exportHref} download style={{ display: 'inline-block', marginTop: 12 }}>
        Download CSV
      </a>
    </div>
  );
}

import { useState, type Dispatch, type SetStateAction } from 'react';
import type { DashboardFilters, DashboardModel, OriginInput } from '../types';
import { BAND_OPTIONS, ORIGIN_COLOR, toggleBand } from '../lib/bands';

interface SidebarProps {
  origin: OriginInput;
  onOriginSubmit: (o: OriginInput) => void;
  filters: DashboardFilters;
  setFilters: Dispatch<SetStateAction<DashboardFilters>>;
  model: DashboardModel | null;
  loading: boolean;
  error: string | null;
}

const CAPACITY_OPTIONS: { key: 'general' | 'montessori' | 'support'; label: string }[] = [
  { key: 'general', label: 'General seats' },
  { key: 'montessori', label: 'Montessori seats' },
  { key: 'support', label: 'Psychophysical support seats' },
];

const sectionStyle = { padding: 16, borderBottom: '1px solid #eee' };
const headingStyle = { margin: '0 0 8px 0', fontSize: 14, fontWeight: 600 };
const labelStyle = { display: 'flex', alignItems: 'center', gap: 8, marginBottom: 8, cursor: 'pointer' };

function Swatch({ color }: { color: string }) {
  return (
    <span
      style={{ display: 'inline-block', width: 10, height: 10, borderRadius: '50%', background: color }}
    />
  );
}

function OriginForm({ origin, onSubmit }: { origin: OriginInput; onSubmit: (o: OriginInput) => void }) {
  const [mode, setMode] = useState<OriginInput['kind']>(origin.kind);
  const [address, setAddress] = useState(origin.kind === 'address' ? origin.address : '');
  const [lat, setLat] = useState(origin.kind === 'coordinates' ? String(origin.lat) : '');
  const [lon, setLon] = useState(origin.kind === 'coordinates' ? String(origin.lon) : '');
  const [formError, setFormError] = useState<string | null>(null);

  const submit = () => {
    if (mode === 'address') {
      if (!address.trim()) {
        setFormError('Enter an address or a town.');
        return;
      }
      setFormError(null);
      onSubmit({ kind: 'address', address: address.trim() });
      return;
    }
    const la = Number(lat);
    const lo = Number(lon);
    if (lat.trim() === '' || lon.trim() === '' || !Number.isFinite(la) || !Number.isFinite(lo)) {
      setFormError('Latitude and longitude must be numbers.');
      return;
    }
    setFormError(null);
    onSubmit({ kind: 'coordinates', lat: la, lon: lo });
  };

  return (
    <form
      onSubmit={(e) => {
        e.preventDefault();
        submit();
      }}
    >
      <div style={{ display: 'flex', gap: 12, marginBottom: 8, fontSize: 13 }}>
        <label style={{ cursor: 'pointer' }}>
          <input type="radio" checked={mode === 'address'} onChange={() => setMode('address')} /> Address
        </label>
        <label style={{ cursor: 'pointer' }}>
          <input type="radio" checked={mode === 'coordinates'} onChange={() => setMode('coordinates')} /> Coordinates
        </label>
      </div>
      {mode === 'address' ? (
        <input
          type="text"
          value={address}
          placeholder="Address or town"
          onChange={(e) => setAddress(e.target.value)}
          style={{ width: '100%', padding: 6, boxSizing: 'border-box' }}
        />
      ) : (
        <div style={{ display: 'flex', gap: 6 }}>
          <input type="text" value={lat} placeholder="Latitude" onChange={(e) => setLat(e.target.value)} style={{ width: '50%', padding: 6 }} />
          <input type="text" value={lon} placeholder="Longitude" onChange={(e) => setLon(e.target.value)} style={{ width: '50%', padding: 6 }} />
        </div>
      )}
      <button type="submit" style={{ marginTop: 8 }}>Set starting point</button>
      {formError && <div style={{ color: '#c62828', fontSize: 12, marginTop: 6 }}>{formError}</div>}
    </form>
  );
}

export default function Sidebar({ origin, onOriginSubmit, filters, setFilters, model, loading, error }: SidebarProps) {
  return (
    <div
      style={{
        width: 320,
        flexShrink: 0,
        height: '100%',
        overflowY: 'auto',
        borderRight: '1px solid #ddd',
        background: '#fff',
        fontSize: 13,
      }}
    >
      <div style={sectionStyle}>
        <h1 style={{ margin: '0 0 12px 0', fontSize: 18, fontWeight: 600 }}>School distance map</h1>
        <h2 style={headingStyle}>Starting point</h2>
        <OriginForm origin={origin} onSubmit={onOriginSubmit} />
        {model && <div style={{ color: '#666', marginTop: 8 }}>{model.origin.label}</div>}
      </div>

      <div style={sectionStyle}>
        <h2 style={headingStyle}>Distance bands</h2>
        {BAND_OPTIONS.map(({ band, color }) => (
          <label key={band} style={labelStyle}>
            <input
              type="checkbox"
              checked={filters.bands.includes(band)}
              onChange={() => setFilters((f) => ({ ...f, bands: toggleBand(f.bands, band) }))}
            />
            <Swatch color={color} /> {band}
          </label>
        ))}
      </div>

      <div style={sectionStyle}>
        <h2 style={headingStyle}>Seats available</h2>
        {CAPACITY_OPTIONS.map(({ key, label }) => (
          <label key={key} style={labelStyle}>
            <input
              type="checkbox"
              checked={filters[key]}
              onChange={(e) => setFilters((f) => ({ ...f, [key]: e.target.checked }))}
            />
            {label}
          </label>
        ))}
      </div>

      <div style={sectionStyle}>
        <h2 style={headingStyle}>Search & routes</h2>
        <input
          type="search"
          value={filters.query}
          placeholder="School or municipality"
          onChange={(e) => setFilters((f) => ({ ...f, query: e.target.value }))}
          style={{ width: '100%', padding: 6, boxSizing: 'border-box', marginBottom: 8 }}
        />
        <label style={labelStyle}>
          <input
            type="checkbox"
            checked={filters.routes}
            onChange={(e) => setFilters((f) => ({ ...f, routes: e.target.checked }))}
          />
          Cycling routes
        </label>
      </div>

      <div style={sectionStyle}>
        {loading && <div style={{ color: '#666' }}>Calculating…</div>}
        {error && <div style={{ color: '#c62828' }}>{error}</div>}
        {model?.warnings.map((w, i) => (
          <div key={i} style={{ color: '#b26a00', marginTop: 4 }}>
            {w}
          </div>
        ))}
      </div>

      <div style={sectionStyle}>
        <h2 style={headingStyle}>Legend</h2>
        <div style={{ display: 'flex', alignItems: 'center', gap: 8, marginBottom: 4 }}>
          <Swatch color={ORIGIN_COLOR} /> Starting point
        </div>
        {BAND_OPTIONS.map(({ band, color }) => (
          <div key={band} style={{ display: 'flex', alignItems: 'center', gap: 8, marginBottom: 4 }}>
            <Swatch color={color} /> {band}
          </div>
        ))}
      </div>
    </div>
  );
}

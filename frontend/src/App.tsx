import { useEffect, useMemo, useState } from 'react';
import MapView from './components/Map';
import Sidebar from './components/Sidebar';
import SchoolTable from './components/SchoolTable';
import type { DashboardFilters, DashboardModel, OriginInput } from './types';
import { dashboardParams, exportUrl, fetchDashboard } from './lib/api';
import { debounce } from './lib/debounce';

type Tab = 'map' | 'table';

const SEARCH_DEBOUNCE_MS = 400;

function Metric({ label, value }: { label: string; value: string | number }) {
  return (
    <div style={{ flex: 1, padding: '8px 12px', borderRight: '1px solid #eee' }}>
      <div style={{ fontSize: 11, color: '#666' }}>{label}</div>
      <div style={{ fontSize: 18, fontWeight: 600 }}>{value}</div>
    </div>
  );
}

export default function App() {
  const [origin, setOrigin] = useState<OriginInput>({ kind: 'address', address: 'Brugherio' });
  const [filters, setFilters] = useState<DashboardFilters>({
    bands: ['0-10 km'],
    general: false,
    montessori: false,
    support: false,
    routes: true,
    query: '',
  });
  const [model, setModel] = useState<DashboardModel | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [tab, setTab] = useState<Tab>('map');

  // the search box only reaches the API once typing pauses
  const [query, setQuery] = useState(filters.query);
  const updateQuery = useMemo(() => debounce(setQuery, SEARCH_DEBOUNCE_MS), []);
  useEffect(() => {
    updateQuery(filters.query);
  }, [filters.query, updateQuery]);
  useEffect(() => () => updateQuery.cancel(), [updateQuery]);

  const { bands, general, montessori, support, routes } = filters;
  const params = useMemo(
    () => dashboardParams(origin, { bands, general, montessori, support, routes, query }),
    [origin, bands, general, montessori, support, routes, query],
  );

  useEffect(() => {
    const ctrl = new AbortController();
    setLoading(true);
    setError(null);
    fetchDashboard(params, ctrl.signal)
      .then((m) => setModel(m))
      .catch((e: unknown) => {
        if (ctrl.signal.aborted) return;
        const msg = e instanceof Error ? e.message : String(e);
        setError(msg);
        setModel(null);
        console.error('Dashboard load error:', msg);
      })
      .finally(() => {
        if (!ctrl.signal.aborted) setLoading(false);
      });
    return () => ctrl.abort();
  }, [params]);

  const summary = model?.summary;

  return (
    <div style={{ display: 'flex', width: '100%', height: '100%' }}>
      <Sidebar
        origin={origin}
        onOriginSubmit={setOrigin}
        filters={filters}
        setFilters={setFilters}
        model={model}
        loading={loading}
        error={error}
      />
      <div style={{ flex: 1, display: 'flex', flexDirection: 'column', minWidth: 0 }}>
        <div style={{ display: 'flex', borderBottom: '1px solid #ddd' }}>
          {(['map', 'table'] as const).map((t) => (
            <button
              key={t}
              onClick={() => setTab(t)}
              style={{
                padding: '8px 16px',
                border: 'none',
                borderBottom: tab === t ? '2px solid #1e40af' : '2px solid transparent',
                background: 'none',
                cursor: 'pointer',
                fontWeight: tab === t ? 600 : 400,
              }}
            >
              {t === 'map' ? 'Map' : 'Table'}
            </button>
          ))}
        </div>
        {summary && (
          <div style={{ display: 'flex', borderBottom: '1px solid #eee' }}>
            <Metric label="Total schools" value={summary.total} />
            <Metric label="Mean distance" value={summary.meanDistanceKm == null ? '-' : `${summary.meanDistanceKm} km`} />
            <Metric label="General seats" value={summary.withGeneralSeats} />
            <Metric label="Montessori seats" value={summary.withMontessoriSeats} />
            <Metric label="Support seats" value={summary.withSupportSeats} />
          </div>
        )}
        <div style={{ flex: 1, position: 'relative', minHeight: 0 }}>
          <div style={{ position: 'absolute', inset: 0, visibility: tab === 'map' ? 'visible' : 'hidden' }}>
            <MapView model={model} />
          </div>
          {tab === 'table' && model && (
            <div style={{ position: 'absolute', inset: 0, background: '#fff' }}>
              <SchoolTable model={model} exportHref={exportUrl(params)} />
            </div>
          )}
        </div>
      </div>
    </div>
  );
}

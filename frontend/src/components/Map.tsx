import { useEffect, useRef, useState } from 'react';
import maplibregl, { GeoJSONSource, type MapLayerMouseEvent, type StyleSpecification } from 'maplibre-gl';
import type { Feature, FeatureCollection, LineString } from 'geojson';
import type { DashboardModel, RouteOverlay } from '../types';
import { ORIGIN_COLOR } from '../lib/bands';
import { escapeHtml, routePopupHtml, schoolPopupHtml, schoolTooltip } from '../lib/popup';

const DEFAULT_CENTER: [number, number] = [9.3, 45.55];
const DEFAULT_ZOOM = 11;

// Free basemap: OpenStreetMap tiles (no API key)
const BASEMAP_STYLE: StyleSpecification = {
  version: 8,
  sources: {
    osm: {
      type: 'raster',
      tiles: ['https://tile.openstreetmap.org/{z}/{x}/{y}.png'],
      tileSize: 256,
      attribution: '© OpenStreetMap',
    },
  },
  layers: [{ id: 'osm', type: 'raster', source: 'osm' }],
};

type RouteProps = { row: number; name: string; color: string };

function routesToGeoJSON(routes: RouteOverlay[]): FeatureCollection<LineString, RouteProps> {
  const features: Feature<LineString, RouteProps>[] = routes
    .filter((r) => r.points.length > 1)
    .map((r) => ({
      type: 'Feature',
      properties: { row: r.row, name: r.name, color: r.color },
      // overlay points are [lat, lon]; GeoJSON wants [lon, lat]
      geometry: { type: 'LineString', coordinates: r.points.map(([lat, lon]) => [lon, lat]) },
    }));
  return { type: 'FeatureCollection', features };
}

interface MapProps {
  model: DashboardModel | null;
}

export default function Map({ model }: MapProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const mapRef = useRef<maplibregl.Map | null>(null);
  const markersRef = useRef<maplibregl.Marker[]>([]);
  const [styleReady, setStyleReady] = useState(false);

  useEffect(() => {
    if (!containerRef.current) return;
    const map = new maplibregl.Map({
      container: containerRef.current,
      style: BASEMAP_STYLE,
      center: DEFAULT_CENTER,
      zoom: DEFAULT_ZOOM,
    });
    map.addControl(new maplibregl.NavigationControl(), 'top-right');
    map.on('load', () => {
      map.addSource('school-routes', { type: 'geojson', data: routesToGeoJSON([]) });
      map.addLayer({
        id: 'school-routes',
        type: 'line',
        source: 'school-routes',
        layout: { 'line-cap': 'round', 'line-join': 'round' },
        paint: { 'line-color': ['get', 'color'], 'line-width': 3, 'line-opacity': 0.7 },
      });
      setStyleReady(true);
    });
    mapRef.current = map;
    return () => {
      map.remove();
      mapRef.current = null;
    };
  }, []);

  // Markers: one for the origin, one per retained school.
  useEffect(() => {
    const map = mapRef.current;
    if (!map) return;
    markersRef.current.forEach((m) => m.remove());
    markersRef.current = [];
    if (!model) return;

    const origin = new maplibregl.Marker({ color: ORIGIN_COLOR })
      .setLngLat([model.origin.lon, model.origin.lat])
      .setPopup(new maplibregl.Popup({ maxWidth: '350px' }).setHTML(`Start: ${escapeHtml(model.origin.label)}`))
      .addTo(map);
    markersRef.current.push(origin);

    const bounds = new maplibregl.LngLatBounds([model.origin.lon, model.origin.lat], [model.origin.lon, model.origin.lat]);
    for (const s of model.markers) {
      const marker = new maplibregl.Marker({ color: s.color, scale: 0.8 })
        .setLngLat([s.lon, s.lat])
        .setPopup(new maplibregl.Popup({ maxWidth: '350px' }).setHTML(schoolPopupHtml(s)))
        .addTo(map);
      marker.getElement().title = schoolTooltip(s);
      markersRef.current.push(marker);
      bounds.extend([s.lon, s.lat]);
    }
    if (model.markers.length) {
      map.fitBounds(bounds, { padding: 60, maxZoom: 14, duration: 0 });
    } else {
      map.jumpTo({ center: [model.origin.lon, model.origin.lat], zoom: DEFAULT_ZOOM });
    }
  }, [model]);

  // Route lines; records without a route simply have no line.
  useEffect(() => {
    const map = mapRef.current;
    if (!map || !styleReady) return;
    const source = map.getSource('school-routes');
    if (source instanceof GeoJSONSource) {
      source.setData(routesToGeoJSON(model?.routes ?? []));
    }

    const routes = model?.routes ?? [];
    const handleClick = (e: MapLayerMouseEvent) => {
      const row = Number(e.features?.[0]?.properties?.row);
      const overlay = routes.find((r) => r.row === row);
      if (!overlay) return;
      new maplibregl.Popup().setLngLat(e.lngLat).setHTML(routePopupHtml(overlay)).addTo(map);
    };
    const handleEnter = () => {
      map.getCanvas().style.cursor = 'pointer';
    };
    const handleLeave = () => {
      map.getCanvas().style.cursor = '';
    };
    map.on('click', 'school-routes', handleClick);
    map.on('mouseenter', 'school-routes', handleEnter);
    map.on('mouseleave', 'school-routes', handleLeave);
    return () => {
      map.off('click', 'school-routes', handleClick);
      map.off('mouseenter', 'school-routes', handleEnter);
      map.off('mouseleave', 'school-routes', handleLeave);
    };
  }, [model, styleReady]);

  return <div ref={containerRef} style={{ position: 'absolute', inset: 0 }} />;
}

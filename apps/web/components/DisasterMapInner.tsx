import { CircleMarker, MapContainer, TileLayer, Tooltip, useMapEvents } from 'react-leaflet';
import { useState } from 'react';
import type { MapLayer, ViewState, ViewportChange } from '@world-disasters/shared';
import { densityColor, densityOpacity } from 'lib/ui/density';
import { formatCount, formatDamage, formatHover } from 'lib/ui/format';

const POINT_COLOR = '#b91c1c';
const PLACEHOLDER_COLOR = '#6b7280';

interface Props {
  initialViewState: ViewState;
  layer: MapLayer | null;
  onViewportChange: (change: ViewportChange) => void;
}

function ViewportWatcher({ onViewportChange }: { onViewportChange: (change: ViewportChange) => void }) {
  const map = useMapEvents({
    moveend: () => {
      const center = map.wrapLatLng(map.getCenter());
      onViewportChange({ zoom: map.getZoom(), center: { lat: center.lat, lon: center.lng } });
    },
  });
  return null;
}

function HoverLines({ lines }: { lines: string[] }) {
  const [title, ...rest] = lines;
  return (
    <div className="space-y-0.5">
      <div className="font-semibold">{title}</div>
      {rest.map((line) => (
        <div key={line} className="text-xs text-gray-700">
          {line}
        </div>
      ))}
    </div>
  );
}

function LayerMarkers({ layer }: { layer: MapLayer }) {
  switch (layer.kind) {
    case 'placeholder':
      return (
        <CircleMarker
          center={[layer.point.lat, layer.point.lon]}
          radius={6}
          pathOptions={{ color: PLACEHOLDER_COLOR, fillColor: PLACEHOLDER_COLOR, fillOpacity: 0.5, weight: 1 }}
        >
          <Tooltip>No events for this selection</Tooltip>
        </CircleMarker>
      );
    case 'density':
      return (
        <>
          {layer.cells.map((cell, index) => (
            <CircleMarker
              key={`cell:${index}:${cell.lat}:${cell.lon}`}
              center={[cell.lat, cell.lon]}
              radius={layer.radius}
              pathOptions={{
                stroke: false,
                fillColor: densityColor(cell.intensity),
                fillOpacity: densityOpacity(cell.intensity),
              }}
            >
              <Tooltip>
                <HoverLines
                  lines={[
                    cell.label,
                    `Events: ${formatCount(cell.count)}`,
                    `Total Deaths: ${formatCount(cell.totalDeaths)}`,
                    `Total Damage: ${formatDamage(cell.totalDamage)}`,
                  ]}
                />
              </Tooltip>
            </CircleMarker>
          ))}
        </>
      );
    case 'points':
      return (
        <>
          {layer.points.map((point, index) => (
            <CircleMarker
              key={`point:${index}:${point.lat}:${point.lon}`}
              center={[point.lat, point.lon]}
              radius={point.size / 2}
              pathOptions={{ color: POINT_COLOR, fillColor: POINT_COLOR, fillOpacity: layer.opacity, opacity: layer.opacity, weight: 1 }}
            >
              <Tooltip>
                <HoverLines lines={formatHover(point)} />
              </Tooltip>
            </CircleMarker>
          ))}
        </>
      );
  }
}

export default function DisasterMapInner({ initialViewState, layer, onViewportChange }: Props) {
  const [tileError, setTileError] = useState<string | null>(null);

  return (
    <div className="relative">
      <MapContainer
        center={[initialViewState.center.lat, initialViewState.center.lon]}
        zoom={initialViewState.zoom}
        scrollWheelZoom={true}
        worldCopyJump={true}
        className="h-[70vh] w-full rounded-xl"
      >
        <ViewportWatcher onViewportChange={onViewportChange} />
        <TileLayer
          attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors'
          url="https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png"
          eventHandlers={{
            tileerror: () => {
              setTileError((prev) => prev ?? 'Map tiles failed to load. Check your network connection.');
            },
          }}
        />
        {layer && <LayerMarkers layer={layer} />}
      </MapContainer>

      {tileError && (
        <div className="pointer-events-none absolute left-3 top-3 z-[1000] max-w-[85%] rounded-xl border bg-white/90 px-3 py-2 text-xs font-semibold text-amber-900 ring-1 ring-amber-200">
          {tileError}
        </div>
      )}
    </div>
  );
}

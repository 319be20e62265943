import dynamic from 'next/dynamic';
import type { MapDescriptor, ViewState, ViewportChange } from '@world-disasters/shared';

const DynamicMap = dynamic(() => import('./DisasterMapInner'), {
  ssr: false,
  loading: () => <div className="h-[70vh] w-full animate-pulse rounded-xl bg-gray-100" />,
});

interface Props {
  initialViewState: ViewState;
  map: MapDescriptor | null;
  onViewportChange: (change: ViewportChange) => void;
}

export default function DisasterMap({ initialViewState, map, onViewportChange }: Props) {
  return (
    <DynamicMap initialViewState={initialViewState} layer={map?.layer ?? null} onViewportChange={onViewportChange} />
  );
}

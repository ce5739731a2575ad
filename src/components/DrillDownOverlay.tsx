import React from 'react';
import type { DrillDownResolver } from '../engine/drillDownResolver';
import type { DrillDownQuery } from '../types/dashboard';
import { useDrillDownOverlay } from '../hooks/useDrillDownOverlay';
import { DrillDownModal } from './DrillDownModal';
import { RecordDetailModal } from './RecordDetailModal';

export interface DrillDownOverlayProps {
  resolver: DrillDownResolver;
}

function queryKey({ location = '', month = '', year = '' }: DrillDownQuery): string {
  return `${location}|${year}|${month}`;
}

/** The single shared list overlay plus its nested detail view. */
export const DrillDownOverlay: React.FC<DrillDownOverlayProps> = ({ resolver }) => {
  const { list, pending, detail } = useDrillDownOverlay(resolver);
  if (!list) return null;
  return (
    <>
      {/* Keyed by query: export state resets when the list content is replaced. */}
      <DrillDownModal
        key={queryKey(list.query)}
        list={list}
        pending={pending}
        onSelectRecord={(record) => resolver.openDetail(record)}
        onClose={() => resolver.close()}
      />
      {detail && <RecordDetailModal record={detail} onClose={() => resolver.closeDetail()} />}
    </>
  );
};

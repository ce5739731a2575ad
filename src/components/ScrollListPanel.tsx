import React from 'react';
import type { CarouselOptions, PanelCarouselEngine } from '../engine/panelCarousel';
import { usePanelCarousel } from '../hooks/usePanelCarousel';
import { formatThousands } from '../lib/format';
import type { ListPanelBinding, RowCell, RowTuple } from '../types/dashboard';

export interface ScrollListPanelProps {
  binding: ListPanelBinding;
  rows: readonly RowTuple[];
  engine: PanelCarouselEngine<RowTuple>;
  options: CarouselOptions;
}

function cellText(cell: RowCell | undefined): string {
  if (typeof cell === 'number') return formatThousands(cell);
  return cell ?? '';
}

/** Endless vertical list; hovering pauses it. */
export const ScrollListPanel: React.FC<ScrollListPanelProps> = ({
  binding,
  rows,
  engine,
  options,
}) => {
  const { listRef, loopRows, pause, resume } = usePanelCarousel(engine, binding.id, rows, options);

  return (
    <div className="flex flex-col h-full min-h-0 text-sm" onMouseEnter={pause} onMouseLeave={resume}>
      <div className="flex shrink-0 bg-slate-800/80 text-slate-300 font-medium">
        {binding.columns.map((col) => (
          <span key={col} className="flex-1 px-3 py-2 truncate">
            {col}
          </span>
        ))}
      </div>
      <div className="flex-1 min-h-0 overflow-hidden">
        <ul ref={listRef} className="scrollList" data-testid={`scroll-list-${binding.id}`}>
          {loopRows.map((row, i) => (
            <li
              key={i}
              className="flex text-slate-200 border-b border-slate-800"
              style={{ height: options.distance }}
            >
              {binding.columns.map((col, c) => (
                <span key={col} className="flex-1 px-3 leading-10 truncate">
                  {cellText(row[c])}
                </span>
              ))}
            </li>
          ))}
        </ul>
      </div>
    </div>
  );
};

/**
 * DrillDownModal: list overlay for the records behind a clicked chart point.
 * Shows loading, table, explicit empty and error states; `pending` marks a newer query in flight.
 */

import React, { useState } from 'react';
import { Download, Loader2, X } from 'lucide-react';
import type { DrillDownList } from '../engine/drillDownResolver';
import { formatThousands } from '../lib/format';
import { moduleLogger } from '../lib/logger';
import { canExportDrillDown, requestDrillDownExport } from '../services/dashboardApi';
import type { DrillDownQuery, DrillDownRecord } from '../types/dashboard';
import { FIELD_LABELS, LIST_COLUMNS, fieldText } from './drillDownFields';

const log = moduleLogger('drill-down');

export interface DrillDownModalProps {
  list: DrillDownList;
  pending: boolean;
  onSelectRecord: (record: DrillDownRecord) => void;
  onClose: () => void;
}

function queryTitle(query: DrillDownQuery): string {
  const parts = [
    query.location,
    query.year ? `${query.year}年` : undefined,
    query.month ? `${query.month}月` : undefined,
  ].filter(Boolean);
  return parts.length > 0 ? parts.join(' · ') : '全部';
}

function triggerDownload(blob: Blob, query: Required<DrillDownQuery>): void {
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = `drill_down_${query.location}_${query.year}${query.month}.xlsx`;
  a.click();
  URL.revokeObjectURL(url);
}

export const DrillDownModal: React.FC<DrillDownModalProps> = ({
  list,
  pending,
  onSelectRecord,
  onClose,
}) => {
  const [exporting, setExporting] = useState(false);
  const [exportError, setExportError] = useState<string | null>(null);
  const { query } = list;

  const handleExport = async () => {
    if (!canExportDrillDown(query)) return;
    setExporting(true);
    setExportError(null);
    try {
      triggerDownload(await requestDrillDownExport(query), query);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.warn({ query, err: msg }, 'drill-down export failed');
      setExportError(msg);
    } finally {
      setExporting(false);
    }
  };

  return (
    <div
      className="fixed inset-0 z-50 flex items-center justify-center bg-black/60"
      role="dialog"
      aria-modal="true"
      aria-labelledby="drill-down-title"
    >
      <div className="bg-slate-900 border border-slate-700 rounded-lg shadow-xl w-full max-w-5xl mx-4 max-h-[80vh] flex flex-col">
        <div className="flex justify-between items-center p-4 border-b border-slate-700">
          <h2 id="drill-down-title" className="text-sm font-semibold text-slate-200 flex items-center gap-2">
            下钻明细：{queryTitle(query)}
            {pending && <Loader2 size={14} className="animate-spin text-slate-400" aria-label="更新中" />}
          </h2>
          <div className="flex items-center gap-2">
            {list.status === 'ready' && canExportDrillDown(query) && (
              <button
                type="button"
                onClick={handleExport}
                disabled={exporting}
                className="px-3 py-1.5 text-sm bg-blue-600 text-white rounded hover:bg-blue-500 disabled:opacity-50 flex items-center gap-2"
              >
                <Download size={14} />
                {exporting ? '导出中…' : '导出 Excel'}
              </button>
            )}
            <button
              type="button"
              onClick={onClose}
              className="text-slate-400 hover:text-slate-200 p-1"
              aria-label="关闭"
            >
              <X size={18} />
            </button>
          </div>
        </div>
        <div className="p-4 overflow-y-auto flex-1 min-h-0">
          {list.status === 'loading' && <p className="text-slate-400 text-sm">加载中…</p>}
          {list.status === 'error' && (
            <p className="text-red-400 text-sm" role="alert">
              加载失败：{list.message}
            </p>
          )}
          {list.status === 'empty' && <p className="text-slate-400 text-sm">暂无数据</p>}
          {list.status === 'ready' && (
            <>
              <p className="text-slate-400 text-xs mb-2">共 {formatThousands(list.result.total)} 条</p>
              <table className="w-full text-sm text-left text-slate-200">
                <thead className="text-slate-400 border-b border-slate-700">
                  <tr>
                    {LIST_COLUMNS.map((key) => (
                      <th key={key} className="px-2 py-1.5 font-medium">
                        {FIELD_LABELS[key]}
                      </th>
                    ))}
                  </tr>
                </thead>
                <tbody>
                  {list.result.records.map((record, i) => (
                    <tr
                      key={String(record.id ?? i)}
                      onClick={() => onSelectRecord(record)}
                      className="border-b border-slate-800 hover:bg-slate-800 cursor-pointer"
                    >
                      {LIST_COLUMNS.map((key) => (
                        <td key={key} className="px-2 py-1.5 truncate max-w-[16rem]">
                          {fieldText(record[key])}
                        </td>
                      ))}
                    </tr>
                  ))}
                </tbody>
              </table>
            </>
          )}
          {exportError && (
            <p className="text-red-400 text-xs mt-4" role="alert">
              {exportError}
            </p>
          )}
        </div>
      </div>
    </div>
  );
};

import React from 'react';
import { X } from 'lucide-react';
import type { DrillDownRecord } from '../types/dashboard';
import { detailFields } from './drillDownFields';

export interface RecordDetailModalProps {
  record: DrillDownRecord;
  onClose: () => void;
}

/** Every field of one work record, stacked above the list overlay. No query. */
export const RecordDetailModal: React.FC<RecordDetailModalProps> = ({ record, onClose }) => (
  <div
    className="fixed inset-0 z-[60] flex items-center justify-center bg-black/40"
    role="dialog"
    aria-modal="true"
    aria-labelledby="record-detail-title"
  >
    <div className="bg-slate-900 border border-slate-600 rounded-lg shadow-xl w-full max-w-lg mx-4 max-h-[80vh] flex flex-col">
      <div className="flex justify-between items-center p-4 border-b border-slate-700">
        <h2 id="record-detail-title" className="text-sm font-semibold text-slate-200">
          记录详情
        </h2>
        <button
          type="button"
          onClick={onClose}
          className="text-slate-400 hover:text-slate-200 p-1"
          aria-label="关闭详情"
        >
          <X size={18} />
        </button>
      </div>
      <dl className="p-4 overflow-y-auto grid grid-cols-[8rem_1fr] gap-x-4 gap-y-2 text-sm">
        {detailFields(record).map(({ key, label, value }) => (
          <React.Fragment key={key}>
            <dt className="text-slate-400">{label}</dt>
            <dd className="text-slate-200 whitespace-pre-wrap break-words">{value}</dd>
          </React.Fragment>
        ))}
      </dl>
    </div>
  </div>
);

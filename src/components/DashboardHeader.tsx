import React from 'react';
import { useClock } from '../hooks/useClock';

export const DashboardHeader: React.FC<{ title: string }> = ({ title }) => {
  const { date, time, week } = useClock();
  return (
    <header className="h-20 shrink-0 flex items-center justify-between px-8 border-b border-slate-800">
      <h1 className="text-3xl font-semibold tracking-widest text-cyan-200">{title}</h1>
      <div className="text-slate-300 font-mono text-lg flex gap-4" aria-label="当前时间">
        <span>{time}</span>
        <span>{date}</span>
        <span>{week}</span>
      </div>
    </header>
  );
};

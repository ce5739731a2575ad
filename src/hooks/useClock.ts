import { useEffect, useState } from 'react';
import { formatClock, type ClockText } from '../lib/format';

export function useClock(): ClockText {
  const [clock, setClock] = useState(() => formatClock(new Date()));
  useEffect(() => {
    const timer = setInterval(() => setClock(formatClock(new Date())), 1000);
    return () => clearInterval(timer);
  }, []);
  return clock;
}

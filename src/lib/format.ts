const WEEKDAYS = '日一二三四五六';

/** Insert thousands separators into the integer part: 1234567.5 -> "1,234,567.5". */
export function formatThousands(value: number | string): string {
  const [intPart, fraction = ''] = String(value).split('.');
  const sign = intPart.startsWith('-') ? '-' : '';
  const digits = sign ? intPart.slice(1) : intPart;
  const grouped = digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${sign}${grouped}${fraction ? `.${fraction}` : ''}`;
}

function pad2(n: number): string {
  return (n < 10 ? '0' : '') + n;
}

export interface ClockText {
  date: string;
  time: string;
  week: string;
}

export function formatClock(date: Date): ClockText {
  return {
    date: `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`,
    time: `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`,
    week: `星期${WEEKDAYS.charAt(date.getDay())}`,
  };
}

// src/agents/tools/datetime.ts
// 日期时间工具

import { defineTool, stringArg, type Tool } from './types.js';

const WEEKDAYS_ZH = ['星期日', '星期一', '星期二', '星期三', '星期四', '星期五', '星期六'];
const WEEKDAYS_EN = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS_EN = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const pad = (n: number, size = 2) => n.toString().padStart(size, '0');

function dayOfYear(date: Date): number {
  const start = new Date(date.getFullYear(), 0, 1);
  return Math.floor((date.getTime() - start.getTime()) / 86400000) + 1;
}

/**
 * strftime 风格的格式化（本地时区），未知指令原样保留
 */
export function formatDate(date: Date, format: string): string {
  return format.replace(/%([a-zA-Z%])/g, (match, directive: string) => {
    const hours = date.getHours();
    switch (directive) {
      case 'Y': return String(date.getFullYear());
      case 'y': return pad(date.getFullYear() % 100);
      case 'm': return pad(date.getMonth() + 1);
      case 'd': return pad(date.getDate());
      case 'H': return pad(hours);
      case 'I': return pad(hours % 12 === 0 ? 12 : hours % 12);
      case 'p': return hours < 12 ? 'AM' : 'PM';
      case 'M': return pad(date.getMinutes());
      case 'S': return pad(date.getSeconds());
      case 'j': return pad(dayOfYear(date), 3);
      case 'A': return WEEKDAYS_EN[date.getDay()];
      case 'a': return WEEKDAYS_EN[date.getDay()].slice(0, 3);
      case 'B': return MONTHS_EN[date.getMonth()];
      case 'b': return MONTHS_EN[date.getMonth()].slice(0, 3);
      case '%': return '%';
      default: return match;
    }
  });
}

export function createDateTimeTool(now: () => Date = () => new Date()): Tool {
  return defineTool(
    {
      name: 'datetime',
      description: '获取当前日期时间或进行日期计算。',
      parameters: [
        {
          name: 'action',
          type: 'string',
          description: '操作类型',
          required: true,
          enum: ['now', 'date', 'time', 'weekday'],
        },
        {
          name: 'format',
          type: 'string',
          description: '日期时间格式（可选）',
          required: false,
        },
      ],
    },
    (args) => {
      const action = stringArg(args, 'action', '');
      const format = stringArg(args, 'format');
      const current = now();

      switch (action) {
        case 'now':
          return `当前时间: ${formatDate(current, format || '%Y-%m-%d %H:%M:%S')}`;
        case 'date':
          return `当前日期: ${formatDate(current, format || '%Y-%m-%d')}`;
        case 'time':
          return `当前时间: ${formatDate(current, format || '%H:%M:%S')}`;
        case 'weekday':
          return `今天是: ${WEEKDAYS_ZH[current.getDay()]}`;
        default:
          return `未知操作: ${action}`;
      }
    }
  );
}

export const dateTimeTool: Tool = createDateTimeTool();

/**
 * `date` builtin implementation. Prints local time as
 * `Www Mmm DD HH:MM:SS YYYY`; arguments are ignored.
 */

import type { BuiltinCommand } from './types.js';
import { outcome_ok } from './_shared.js';

const WEEKDAYS: readonly string[] = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS: readonly string[] = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export const command: BuiltinCommand = {
    name: 'date',
    create: ({ clock }) => (_args, cwd) => outcome_ok(`${date_format(clock())}\n`, cwd)
};

export function date_format(date: Date): string {
    const pad2 = (value: number): string => String(value).padStart(2, '0');
    const time: string = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
    return `${WEEKDAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${pad2(date.getDate())} ${time} ${date.getFullYear()}`;
}

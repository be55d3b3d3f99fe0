import type { LocaleFlags } from '../../types';

const BASE_RULES = [
  "You are a voice assistant running in the user's terminal.",
  'Keep spoken replies short and conversational.',
  'If the user interrupts you, stop and answer the new request.'
].join(' ');

const pad = (value: number): string => String(value).padStart(2, '0');

export const formatLocalDate = (now: Date): string =>
  `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;

export const formatLocalTime = (now: Date): string =>
  `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;

export interface InstructionContext {
  device: string;
  now: Date;
}

export const buildSessionInstructions = (systemPrompt: string, context: InstructionContext): string => {
  const sections = [
    BASE_RULES,
    `Current system: ${context.device}`,
    `Current time: ${formatLocalDate(context.now)} ${formatLocalTime(context.now)}`
  ];

  const custom = systemPrompt.trim();
  if (custom) {
    sections.push(custom);
  }

  return sections.join('\n\n');
};

/** Appends `(Date: … | Time: …)` to a text turn according to the locale flags. */
export const stampMessage = (text: string, flags: LocaleFlags, now: Date): string => {
  const additions: string[] = [];
  if (flags.includeDate) {
    additions.push(`Date: ${formatLocalDate(now)}`);
  }

  if (flags.includeTime) {
    additions.push(`Time: ${formatLocalTime(now)}`);
  }

  return additions.length > 0 ? `${text} (${additions.join(' | ')})` : text;
};

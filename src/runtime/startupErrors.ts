import path from 'node:path';

type StartupMode = 'telegram' | 'polling' | 'webhook';

type StartupErrorContext = {
  mode: StartupMode;
  botHome: string;
  logDir: string;
  write?: (line: string) => void;
};

const normalizeMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return String(err);
};

const uniqueSteps = (steps: string[]): string[] => {
  return Array.from(new Set(steps));
};

// Env keys named in "Invalid bot configuration: KEY: message" errors.
const INVALID_KEY_PATTERN = /(?:^|[:;]\s*)([A-Z][A-Z0-9_]+):/g;

export const buildNextSteps = (message: string): string[] => {
  const steps: string[] = [];
  const lower = message.toLowerCase();

  if (lower.includes('telegram_bot_token')) {
    steps.push('Set TELEGRAM_BOT_TOKEN in your environment or .env file.');
  }
  if (lower.includes('401') || lower.includes('unauthorized')) {
    steps.push('Check TELEGRAM_BOT_TOKEN: Telegram rejected it. Get a fresh token from @BotFather.');
  }
  if (lower.includes('409') || lower.includes('conflict')) {
    steps.push('Another instance is polling this bot or a webhook is set. Stop it, or set WEBHOOK_URL for webhook mode.');
  }
  if (lower.includes('eaddrinuse')) {
    steps.push('PORT is already in use. Pick a free PORT or stop the other process.');
  }
  if (lower.includes('invalid bot configuration')) {
    for (const match of message.matchAll(INVALID_KEY_PATTERN)) {
      steps.push(`Fix ${match[1]} in your environment or .env file (see .env.example).`);
    }
  }
  if (lower.includes('tesseract')) {
    steps.push('Install the tesseract executable or set TESSERACT_CMD / OCR_BACKENDS.');
  }

  steps.push('Run `npm run doctor` to validate env and dependencies.');
  return uniqueSteps(steps);
};

export function reportStartupError(err: unknown, context: StartupErrorContext): void {
  const write = context.write ?? ((line: string) => console.error(line));
  const message = normalizeMessage(err);

  write(`scanlate (${context.mode}) failed to start.`);
  write(`Reason: ${message}`);
  write('Relevant paths:');
  write(`- SCANLATE_HOME: ${context.botHome}`);
  write(`- Env file: ${path.resolve('.env')}`);
  write(`- Logs (events): ${path.join(context.logDir, 'events.jsonl')}`);
  write(`- Logs (runtime): ${path.join(context.logDir, 'runtime.jsonl')}`);
  write('Next steps:');
  for (const step of buildNextSteps(message)) {
    write(`- ${step}`);
  }
}

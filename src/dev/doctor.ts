import 'dotenv/config';

import { execFile } from 'node:child_process';
import { access, mkdir } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import { promisify } from 'node:util';

import { loadBotConfig, type BotConfig } from '../runtime/botConfig.js';
import { getBotHome } from '../runtime/botHome.js';
import { loadLanguageTable } from '../translation/languages.js';

type CheckStatus = 'OK' | 'WARN' | 'FAIL';

type CheckResult = {
  status: CheckStatus;
  label: string;
  details?: string;
};

const execFileAsync = promisify(execFile);

const results: CheckResult[] = [];
const failures: CheckResult[] = [];

const addResult = (status: CheckStatus, label: string, details?: string) => {
  const entry = { status, label, details };
  results.push(entry);
  if (status === 'FAIL') {
    failures.push(entry);
  }
};

const formatDetails = (details?: string) => (details ? ` (${details})` : '');
const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

const botHome = getBotHome(process.env);

console.log('scanlate doctor (preflight)');
console.log(`SCANLATE_HOME: ${botHome}`);

let config: BotConfig | null = null;
try {
  config = loadBotConfig(process.env);
  addResult('OK', 'env configuration', 'valid');
} catch (err) {
  addResult('FAIL', 'env configuration', messageOf(err));
}

if (config) {
  addResult(
    config.openai.apiKey ? 'OK' : 'WARN',
    'env OPENAI_API_KEY',
    config.openai.apiKey ? 'set' : 'missing (LLM translation, text repair and vision OCR disabled)',
  );
  addResult(
    'OK',
    'mode',
    config.telegram.webhook.url ? `webhook ${config.telegram.webhook.url}` : 'long polling',
  );

  if (config.ocr.backends.includes('tesseract')) {
    try {
      const { stdout } = await execFileAsync(config.ocr.tesseractCmd, ['--version']);
      addResult('OK', 'tesseract', stdout.split('\n')[0]?.trim() || config.ocr.tesseractCmd);
    } catch (err) {
      addResult(
        config.ocr.backends.length > 1 ? 'WARN' : 'FAIL',
        'tesseract',
        `${config.ocr.tesseractCmd}: ${messageOf(err)}`,
      );
    }
  }

  if (config.keepAlive.enabled && !config.keepAlive.url) {
    addResult('WARN', 'keep-alive', 'enabled but neither KEEP_ALIVE_URL nor RENDER_EXTERNAL_URL is set');
  }
}

try {
  const languages = loadLanguageTable();
  addResult('OK', 'language table', `${languages.length} languages`);
} catch (err) {
  addResult('FAIL', 'language table', messageOf(err));
}

const logDir = config?.logging.logDir ?? botHome;
try {
  await mkdir(logDir, { recursive: true });
  await access(logDir, fsConstants.W_OK);
  addResult('OK', 'log directory writable', logDir);
} catch (err) {
  addResult('FAIL', 'log directory writable', messageOf(err));
}

for (const result of results) {
  console.log(`[${result.status}] ${result.label}${formatDetails(result.details)}`);
}

if (failures.length > 0) {
  console.error('Doctor found blocking issues. Fix the failures above and re-run `npm run doctor`.');
  process.exit(1);
}

console.log('Doctor finished with no blocking issues.');

import * as fs from 'fs';
import pc from 'picocolors';
import { loadConfig } from '../config/config.loader';
import { AppConfig } from '../config/config.types';
import { PORTKEY_BASE_URL } from '../portkey/portkey.constants';
import { redactSecret } from '../utils/redact';
import { resolveConfigPath } from './paths';

export interface CheckResult {
  name: string;
  passed: boolean;
  detail: string;
}

function checkCredential(name: string, value: string): CheckResult {
  if (!value) {
    return { name, passed: false, detail: 'empty' };
  }
  return { name, passed: true, detail: redactSecret(value) };
}

/** Local checks only; nothing here reaches the gateway. */
export function collectStatus(configPath: string = resolveConfigPath()): CheckResult[] {
  if (!fs.existsSync(configPath)) {
    return [
      { name: 'Config file', passed: false, detail: `not found (${configPath})` },
      { name: 'Config schema', passed: false, detail: 'config not loaded' },
    ];
  }

  const results: CheckResult[] = [{ name: 'Config file', passed: true, detail: configPath }];

  let config: AppConfig;
  try {
    config = loadConfig(configPath);
  } catch (err) {
    results.push({ name: 'Config schema', passed: false, detail: err instanceof Error ? err.message : String(err) });
    return results;
  }

  results.push({ name: 'Config schema', passed: true, detail: 'valid' });
  results.push(checkCredential('API key', config.portkey.api_key));
  results.push(checkCredential('Virtual key', config.portkey.virtual_key));
  results.push({ name: 'Gateway', passed: true, detail: PORTKEY_BASE_URL });
  return results;
}

export function runStatusCheck(): boolean {
  console.log(pc.bold('\n  Portkey Client Check\n'));

  const results = collectStatus();
  const maxName = Math.max(...results.map((r) => r.name.length));
  for (const r of results) {
    const tag = r.passed ? pc.green(' PASS ') : pc.red(' FAIL ');
    console.log(`  ${tag}  ${r.name.padEnd(maxName)}  ${pc.dim(r.detail)}`);
  }

  const passed = results.filter((r) => r.passed).length;
  const failed = results.length - passed;
  console.log('');
  if (failed === 0) {
    console.log(pc.green(`  All ${passed} checks passed`));
  } else {
    console.log(pc.yellow(`  ${passed} passed, ${failed} failed`));
  }
  console.log('');
  return failed === 0;
}

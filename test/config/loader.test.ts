import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadDigestConfig, CONFIG_DEFAULTS } from '../../src/config/loader';
import { makeTmpDir, removeDir } from '../helpers/fixtures';

describe('loadDigestConfig', () => {
  let dir: string;
  let configPath: string;

  function writeConfig(content: string): void {
    fs.writeFileSync(configPath, content);
  }

  beforeEach(() => {
    dir = makeTmpDir('config');
    configPath = path.join(dir, '.transcript-digest.yml');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('returns defaults when the file is missing', () => {
    expect(loadDigestConfig(configPath)).toEqual({ config: CONFIG_DEFAULTS, warnings: [] });
  });

  it('returns defaults for an empty or comments-only file', () => {
    writeConfig('   \n');
    expect(loadDigestConfig(configPath)).toEqual({ config: CONFIG_DEFAULTS, warnings: [] });

    writeConfig('# nothing configured yet\n');
    expect(loadDigestConfig(configPath)).toEqual({ config: CONFIG_DEFAULTS, warnings: [] });
  });

  it('merges configured values over defaults', () => {
    writeConfig(
      [
        'input_location: inbox',
        'poll_interval_ms: 500',
        'queue:',
        '  extension: .transcript',
        'llm:',
        '  temperature: 0',
      ].join('\n'),
    );

    const { config, warnings } = loadDigestConfig(configPath);

    expect(warnings).toEqual([]);
    expect(config).toEqual({
      ...CONFIG_DEFAULTS,
      input_location: 'inbox',
      poll_interval_ms: 500,
      queue: { extension: '.transcript', claim_extension: '.processing' },
      llm: { ...CONFIG_DEFAULTS.llm, temperature: 0 },
    });
  });

  it('warns and uses defaults for invalid YAML', () => {
    writeConfig('input_location: [unclosed\n');

    const { config, warnings } = loadDigestConfig(configPath);

    expect(config).toEqual(CONFIG_DEFAULTS);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].field).toBe('_yaml');
    expect(warnings[0].message).toMatch(/^E501: Invalid YAML syntax: .*Using defaults\.$/s);
  });

  it('warns when the document is not a mapping', () => {
    writeConfig('- input\n- output\n');

    expect(loadDigestConfig(configPath)).toEqual({
      config: CONFIG_DEFAULTS,
      warnings: [{ field: '_yaml', message: 'E501: Config must be a YAML mapping. Using defaults.' }],
    });
  });

  it('keeps valid fields and defaults an invalid one', () => {
    writeConfig('input_location: inbox\npoll_interval_ms: fast\n');

    const { config, warnings } = loadDigestConfig(configPath);

    expect(config.input_location).toBe('inbox');
    expect(config.poll_interval_ms).toBe(2000);
    expect(warnings).toEqual([
      {
        field: 'poll_interval_ms',
        message: 'E502: Expected number, received string. Using default for this field.',
      },
    ]);
  });

  it('suggests a close match for an unknown top-level key', () => {
    writeConfig('input_locaton: inbox\n');

    const { config, warnings } = loadDigestConfig(configPath);

    expect(config.input_location).toBe('input');
    expect(warnings).toEqual([
      { field: 'input_locaton', message: 'E502: Unknown key "input_locaton". Did you mean "input_location"?' },
    ]);
  });

  it('reports unknown nested keys by their full path', () => {
    writeConfig('llm:\n  modle: other-model\n  max_tokens: 2048\n');

    const { config, warnings } = loadDigestConfig(configPath);

    expect(config.llm).toEqual({ ...CONFIG_DEFAULTS.llm, max_tokens: 2048 });
    expect(warnings).toEqual([{ field: 'llm.modle', message: 'E502: Unknown key "modle".' }]);
  });

  it('rejects a claim extension equal to the item extension', () => {
    writeConfig('queue:\n  extension: .processing\n');

    const { config, warnings } = loadDigestConfig(configPath);

    expect(config.queue).toEqual(CONFIG_DEFAULTS.queue);
    expect(warnings).toEqual([
      {
        field: 'queue',
        message: 'E502: queue.extension and queue.claim_extension must differ. Using default for this field.',
      },
    ]);
  });
});

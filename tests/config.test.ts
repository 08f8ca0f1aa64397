import assert from 'node:assert/strict';
import path from 'node:path';
import { describe, it } from 'node:test';

import { loadConfig, parseOrigins, parseSimulatorUrl } from '../src/config';

describe('page host config parsing', () => {
  it('applies defaults when the environment is empty', () => {
    const config = loadConfig({});

    assert.equal(config.port, 3000);
    assert.equal(config.logLevel, 'info');
    assert.equal(config.logPretty, true);
    assert.equal(config.simulator.baseUrl, 'http://localhost:5000');
    assert.deepEqual(config.ingress.corsAllowedOrigins, ['http://localhost:5173']);
    assert.equal(config.ingress.jsonBodyLimit, '1mb');
    assert.equal(config.staticDir, path.resolve(process.cwd(), 'frontend/dist'));
  });

  it('drops trailing slashes from the simulator URL', () => {
    assert.equal(parseSimulatorUrl(' http://sim.local:5000/ '), 'http://sim.local:5000');
    assert.equal(parseSimulatorUrl('https://sim.local/base//'), 'https://sim.local/base');
  });

  it('rejects simulator URLs that are not absolute http(s) URLs', () => {
    assert.throws(() => parseSimulatorUrl('sim.local:5000/api'), /must use http or https|absolute URL/);
    assert.throws(() => parseSimulatorUrl('not a url'), /SIMULATOR_URL must be an absolute URL/);
    assert.throws(() => parseSimulatorUrl('ftp://sim.local'), /SIMULATOR_URL must use http or https/);
  });

  it('splits and trims CORS origins', () => {
    assert.deepEqual(parseOrigins('http://a.test, http://b.test,,'), ['http://a.test', 'http://b.test']);
  });

  it('rejects a non-numeric or non-positive port', () => {
    assert.throws(() => loadConfig({ PORT: 'abc' }), /\[config\] PORT must be a positive integer/);
    assert.throws(() => loadConfig({ PORT: '0' }), /\[config\] PORT must be a positive integer/);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      SIMULATOR_URL: 'http://10.0.0.5:5000/',
      LOG_PRETTY: 'FALSE',
      LOG_LEVEL: 'debug',
      STATIC_DIR: '/srv/consoles',
    });

    assert.equal(config.port, 8080);
    assert.equal(config.simulator.baseUrl, 'http://10.0.0.5:5000');
    assert.equal(config.logPretty, false);
    assert.equal(config.logLevel, 'debug');
    assert.equal(config.staticDir, '/srv/consoles');
  });
});

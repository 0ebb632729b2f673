import { selectBackend } from '../../../src/environment/select.js';
import { defaultConfig } from '../../../src/config/loader.js';
import { HarnessErrorCode } from '../../../src/shared/errors.js';

describe('selectBackend', () => {
  it('lets an external base URL win outright', () => {
    const config = defaultConfig('/work');
    config.externalBaseUrl = 'http://svc.test:8080';
    expect(selectBackend(config, 'containerized')).toBe('external');
    expect(selectBackend(config)).toBe('external');
  });

  it('uses containers only when asked for', () => {
    const config = defaultConfig('/work');
    expect(selectBackend(config)).toBe('local');
    expect(selectBackend(config, 'containerized')).toBe('containerized');
    config.backend = 'containerized';
    expect(selectBackend(config)).toBe('containerized');
    expect(selectBackend(config, 'local')).toBe('local');
  });

  it('rejects an external request without a URL', () => {
    expect(() => selectBackend(defaultConfig('/work'), 'external')).toThrow(
      expect.objectContaining({ code: HarnessErrorCode.SETUP_FAILED })
    );
  });
});

import { describe, expect, it } from 'vitest';
import { LinkValidator } from '../../src/modules/validity';
import { stubClient } from '../helpers/http-stub';

describe('LinkValidator.normalize', () => {
  const validator = new LinkValidator();

  it('adds a missing scheme', () => {
    expect(validator.normalize('acmehvac.com/home')).toBe('https://acmehvac.com/home');
  });

  it('upgrades http to https unless http is allowed', () => {
    expect(validator.normalize('http://acmehvac.com')).toBe('https://acmehvac.com');
    expect(new LinkValidator({ allowHttp: true }).normalize('http://acmehvac.com')).toBe('http://acmehvac.com');
  });

  it('drops the fragment and keeps the query', () => {
    expect(validator.normalize(' https://acmehvac.com/about?x=1#team ')).toBe('https://acmehvac.com/about?x=1');
  });

  it('rejects non-web schemes and empty input', () => {
    expect(validator.normalize('mailto:info@acmehvac.com')).toBeNull();
    expect(validator.normalize('tel:+15550100')).toBeNull();
    expect(validator.normalize('javascript:void(0)')).toBeNull();
    expect(validator.normalize('ftp://acmehvac.com')).toBeNull();
    expect(validator.normalize('   ')).toBeNull();
  });
});

describe('LinkValidator.checkLive', () => {
  const url = 'https://acmehvac.com/home';

  it('treats a 2xx HEAD as live and reports the redirect target', async () => {
    const { client, requests } = stubClient(() => ({ status: 200, finalUrl: 'https://www.acmehvac.com/home' }));
    const result = await new LinkValidator({}, client).checkLive(url, 1000);

    expect(result).toEqual({ isLive: true, finalUrl: 'https://www.acmehvac.com/home', statusCode: 200 });
    expect(requests.map(r => r.method)).toEqual(['head']);
  });

  it('falls back to GET when HEAD gets an ambiguous status', async () => {
    const { client, requests } = stubClient(config => ({ status: config.method === 'head' ? 405 : 200 }));
    const result = await new LinkValidator({}, client).checkLive(url, 1000);

    expect(result).toEqual({ isLive: true, finalUrl: url, statusCode: 200 });
    expect(requests.map(r => r.method)).toEqual(['head', 'get']);
    expect(requests[1].responseType).toBe('stream');
  });

  it('reports the HEAD status when the GET fallback also fails', async () => {
    const { client } = stubClient(config => ({ status: config.method === 'head' ? 403 : 503 }));
    const result = await new LinkValidator({}, client).checkLive(url, 1000);
    expect(result).toEqual({ isLive: false, finalUrl: url, statusCode: 403 });
  });

  it('does not retry with GET on a plain 404', async () => {
    const { client, requests } = stubClient(() => ({ status: 404 }));
    const result = await new LinkValidator({}, client).checkLive(url, 1000);

    expect(result).toEqual({ isLive: false, finalUrl: url, statusCode: 404 });
    expect(requests).toHaveLength(1);
  });

  it('maps transport failures to dead', async () => {
    const { client } = stubClient(() => ({ networkError: 'getaddrinfo ENOTFOUND acmehvac.com' }));
    const result = await new LinkValidator({}, client).checkLive(url, 1000);
    expect(result).toEqual({ isLive: false, finalUrl: url, statusCode: null });
  });
});

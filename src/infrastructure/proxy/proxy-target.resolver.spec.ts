import { BadRequestException } from '@nestjs/common';
import { ProxyConfig } from '../config/proxy.config';
import { buildTargetUrl, ProxyTargetResolver } from './proxy-target.resolver';

describe('ProxyTargetResolver', () => {
  const config: ProxyConfig = {
    targetMap: { Orders_Legacy: 'http://legacy.flink.internal:8081/' },
    defaultTargetTemplate: 'http://{app}-rest.flink.svc:8081',
    timeoutMs: 0,
  };
  const resolver = new ProxyTargetResolver(config);

  it('prefers an explicit mapping', () => {
    expect(resolver.resolve('Orders_Legacy')).toBe('http://legacy.flink.internal:8081/');
  });

  it('expands the default template for other names', () => {
    expect(resolver.resolve('orders')).toBe('http://orders-rest.flink.svc:8081');
  });

  it('replaces every placeholder in the template', () => {
    const resolver = new ProxyTargetResolver({
      ...config,
      defaultTargetTemplate: 'http://{app}.svc/{app}',
    });
    expect(resolver.resolve('orders')).toBe('http://orders.svc/orders');
  });

  it.each(['Orders', 'orders.prod', '-orders', 'orders-', '', 'a'.repeat(64), 'constructor_'])(
    'rejects the unmapped name %p',
    (name) => {
      expect(() => resolver.resolve(name)).toThrow(BadRequestException);
    },
  );

  it('does not treat inherited object keys as mappings', () => {
    expect(() => resolver.resolve('__proto__')).toThrow(BadRequestException);
    expect(resolver.resolve('constructor')).toBe('http://constructor-rest.flink.svc:8081');
  });
});

describe('buildTargetUrl', () => {
  it('joins with exactly one slash', () => {
    expect(buildTargetUrl('http://backend:8081/', '/jobs/overview')).toBe(
      'http://backend:8081/jobs/overview',
    );
    expect(buildTargetUrl('http://backend:8081', 'jobs')).toBe('http://backend:8081/jobs');
  });

  it('keeps an empty path at the base', () => {
    expect(buildTargetUrl('http://backend:8081', '')).toBe('http://backend:8081/');
  });

  it('appends the query string unchanged', () => {
    expect(buildTargetUrl('http://backend:8081', 'jobs', 'get=a&get=b')).toBe(
      'http://backend:8081/jobs?get=a&get=b',
    );
  });
});

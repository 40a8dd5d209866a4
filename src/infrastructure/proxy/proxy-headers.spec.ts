import { filterRequestHeaders, filterResponseHeaders } from './proxy-headers';

describe('proxy headers', () => {
  describe('filterRequestHeaders', () => {
    it('drops hop-by-hop headers and keeps the rest', () => {
      const forwarded = filterRequestHeaders({
        host: 'flink-lens.local',
        connection: 'keep-alive',
        'keep-alive': 'timeout=5',
        'proxy-authorization': 'Basic test-secret',
        te: 'trailers',
        trailers: 'x-checksum',
        'transfer-encoding': 'chunked',
        upgrade: 'websocket',
        accept: 'application/json',
        authorization: 'Bearer test-token',
        'set-cookie': ['a=1', 'b=2'],
        'x-missing': undefined,
      });

      expect(forwarded).toEqual({
        accept: 'application/json',
        authorization: 'Bearer test-token',
        'set-cookie': ['a=1', 'b=2'],
      });
    });
  });

  describe('filterResponseHeaders', () => {
    it('drops framing and encoding headers regardless of case', () => {
      const forwarded = filterResponseHeaders({
        'Content-Encoding': 'gzip',
        'Transfer-Encoding': 'chunked',
        Connection: 'close',
        'content-length': '512',
        'proxy-authenticate': 'Basic',
        'Content-Type': 'application/json',
        'x-retries': 3,
        'set-cookie': ['a=1'],
        'x-null': null,
      });

      expect(forwarded).toEqual({
        'Content-Type': 'application/json',
        'x-retries': '3',
        'set-cookie': ['a=1'],
      });
    });
  });
});

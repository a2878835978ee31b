import { describe, it, expect } from 'vitest';
import dnsPacket from 'dns-packet';
import { RequestMessage } from '../../src/core/request.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('RequestMessage', () => {
  it('should make the name absolute', () => {
    const request = new RequestMessage({ name: 'example.com', type: 'A' });
    expect(request.name).toBe('example.com.');
    expect(request.question).toEqual({ name: 'example.com.', type: 'A', class: 'IN' });
  });

  it('should set RD by default', () => {
    const request = new RequestMessage({ name: 'example.com', type: 'A' });
    expect(request.flags).toEqual({
      recursionDesired: true,
      checkingDisabled: false,
      authenticData: false,
      dnssecOk: false,
    });

    const decoded = dnsPacket.decode(request.encode({ id: 4242 }));
    expect(decoded.id).toBe(4242);
    expect(decoded.flag_rd).toBe(true);
    expect(decoded.flag_cd).toBe(false);
    expect(decoded.questions).toEqual([{ name: 'example.com', type: 'A', class: 'IN' }]);
    expect(decoded.additionals).toEqual([]);
  });

  it('should encode the header flags', () => {
    const request = new RequestMessage(
      { name: 'example.com', type: 'MX' },
      { recursionDesired: false, checkingDisabled: true, authenticData: true }
    );
    const decoded = dnsPacket.decode(request.encode());
    expect(decoded.flag_rd).toBe(false);
    expect(decoded.flag_cd).toBe(true);
    expect(decoded.flag_ad).toBe(true);
  });

  it('should give every encoding the requested or a random ID', () => {
    const request = new RequestMessage({ name: 'example.com', type: 'A' });
    const ids = new Set(Array.from({ length: 20 }, () => request.encode().readUInt16BE(0)));
    expect(ids.size).toBeGreaterThan(1);
  });

  it('should add an OPT record for the UDP payload size', () => {
    const request = new RequestMessage({ name: 'example.com', type: 'A' });
    const decoded = dnsPacket.decode(request.encode({ udpPayloadSize: 4096 }));
    expect(decoded.additionals).toHaveLength(1);
    expect(decoded.additionals?.[0]).toMatchObject({ type: 'OPT', udpPayloadSize: 4096, flag_do: false });
  });

  it('should add an OPT record with DO when asked for DNSSEC records', () => {
    const request = new RequestMessage({ name: 'example.com', type: 'DNSKEY' }, { dnssecOk: true });
    const decoded = dnsPacket.decode(request.encode());
    expect(decoded.additionals?.[0]).toMatchObject({ type: 'OPT', udpPayloadSize: 1232, flag_do: true });
  });

  it('should carry the known serial of an IXFR request', () => {
    const request = new RequestMessage({ name: 'example.com', type: 'IXFR' }, {}, { ixfrSerial: 2024010101 });
    expect(request.isStreaming).toBe(true);

    const decoded = dnsPacket.decode(request.encode());
    expect(decoded.authorities).toHaveLength(1);
    expect(decoded.authorities?.[0]).toMatchObject({
      type: 'SOA',
      name: 'example.com',
      data: { serial: 2024010101 },
    });
  });

  it('should reject a serial on anything but IXFR', () => {
    expect(() => new RequestMessage({ name: 'example.com', type: 'AXFR' }, {}, { ixfrSerial: 1 })).toThrow(
      ConfigurationError
    );
  });

  it('should only stream zone transfers', () => {
    expect(new RequestMessage({ name: 'example.com', type: 'AXFR' }).isStreaming).toBe(true);
    expect(new RequestMessage({ name: 'example.com', type: 'SOA' }).isStreaming).toBe(false);
  });
});

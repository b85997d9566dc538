import { buildCloneTarget, isTransportScheme, parseIdentifier } from './transport';
import { InvalidIdentifierError } from './errors';

describe('transport', () => {
  describe('parseIdentifier', () => {
    it('should split host from owner/name', () => {
      expect(parseIdentifier('github.com/acme/widget')).toEqual({
        host: 'github.com',
        path: 'acme/widget',
      });
    });

    it('should keep only the first two path segments', () => {
      expect(parseIdentifier('github.com/acme/widget/extra/more')).toEqual({
        host: 'github.com',
        path: 'acme/widget',
      });
    });

    it('should drop a trailing slash segment', () => {
      expect(parseIdentifier('gitlab.example.org/team/tool/').path).toBe('team/tool');
    });

    it('should keep a single-segment path as is', () => {
      expect(parseIdentifier('example.org/solo')).toEqual({ host: 'example.org', path: 'solo' });
    });

    it.each(['github.com', '/acme/widget', 'github.com/', ''])(
      'should reject %p',
      (identifier) => {
        expect(() => parseIdentifier(identifier)).toThrow(InvalidIdentifierError);
      }
    );
  });

  describe('buildCloneTarget', () => {
    it('should build an scp-style address for ssh', () => {
      expect(buildCloneTarget('github.com/acme/widget', 'ssh')).toBe('git@github.com:acme/widget');
    });

    it('should build a URL for https', () => {
      expect(buildCloneTarget('github.com/acme/widget', 'https')).toBe('https://github.com/acme/widget');
    });

    it('should ignore segments after owner/name', () => {
      expect(buildCloneTarget('github.com/acme/widget/extra/more', 'ssh')).toBe('git@github.com:acme/widget');
      expect(buildCloneTarget('github.com/acme/widget/extra/more', 'https')).toBe('https://github.com/acme/widget');
    });
  });

  describe('isTransportScheme', () => {
    it('should accept ssh and https only', () => {
      expect(isTransportScheme('ssh')).toBe(true);
      expect(isTransportScheme('https')).toBe(true);
      expect(isTransportScheme('git')).toBe(false);
      expect(isTransportScheme('SSH')).toBe(false);
    });
  });
});

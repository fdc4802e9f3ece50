import { checkoutRef, repositoryUrl } from './checkout.action';

describe('CheckoutAction', () => {
  describe('repositoryUrl', () => {
    it('places a bare owner/name on the git host', () => {
      expect(repositoryUrl('example/rust-library', 'https://git.example.com')).toBe(
        'https://git.example.com/example/rust-library.git',
      );
    });

    it('leaves URLs and paths alone', () => {
      expect(repositoryUrl('https://github.com/example/lib.git', 'https://git.example.com')).toBe(
        'https://github.com/example/lib.git',
      );
      expect(repositoryUrl('/srv/git/lib', 'https://git.example.com')).toBe('/srv/git/lib');
      expect(repositoryUrl('git@github.com:example/lib.git', 'https://git.example.com')).toBe(
        'git@github.com:example/lib.git',
      );
    });
  });

  describe('checkoutRef', () => {
    it('prefers the commit, then the ref, then HEAD', () => {
      expect(checkoutRef({ kind: 'push', ref: 'refs/heads/main', commit: 'abc123' })).toBe('abc123');
      expect(checkoutRef({ kind: 'push', ref: 'refs/heads/main', commit: '' })).toBe('refs/heads/main');
      expect(checkoutRef({ kind: 'manual', ref: '', commit: '' })).toBe('HEAD');
    });
  });
});

/**
 * PathValidator Tests
 * Directory policy: existence, type, forbidden directories and allowed roots
 */

import * as fs from 'fs';
import * as path from 'path';
import { PathValidator } from '../PathValidator';
import { makeDirs, makeTempDir, removeDir, tempRoot } from '../../__tests__/helpers/fixtures';

describe('PathValidator', () => {
  let home: string;
  let outside: string;
  let validator: PathValidator;

  beforeEach(() => {
    home = makeTempDir('afl-home-');
    outside = makeTempDir('afl-out-');
    makeDirs(home, 'Projects/app', 'Documents');
    validator = new PathValidator({ homeDirectory: home, allowedRoots: [home] });
  });

  afterEach(() => {
    removeDir(home);
    removeDir(outside);
  });

  describe('Accepted directories', () => {
    test('should accept a home descendant and return its absolute path', () => {
      const result = validator.validateDirectory(path.join(home, 'Projects', 'app'));

      expect(result.isValid).toBe(true);
      if (result.isValid) {
        expect(result.validated.path).toBe(path.join(home, 'Projects', 'app'));
        expect(result.validated.kind).toBe('directory');
        expect(Object.isFrozen(result.validated)).toBe(true);
      }
    });

    test('should expand ~ against the configured home directory', () => {
      const result = validator.validateDirectory('~/Projects/app');

      expect(result.isValid).toBe(true);
      if (result.isValid) {
        expect(result.validated.path).toBe(path.join(home, 'Projects', 'app'));
      }
    });

    test('should resolve relative paths against home', () => {
      const result = validator.validateDirectory('Documents');

      expect(result.isValid).toBe(true);
      if (result.isValid) {
        expect(result.validated.path).toBe(path.join(home, 'Documents'));
      }
    });

    test('should accept the allowed root itself', () => {
      const result = validator.validateDirectory(home);
      expect(result.isValid).toBe(true);
    });

    test('should give the same answer when called twice', () => {
      const first = validator.validateDirectory('~/Projects/app');
      const second = validator.validateDirectory('~/Projects/app');

      expect(first.isValid).toBe(second.isValid);
      if (first.isValid && second.isValid) {
        expect(first.validated.path).toBe(second.validated.path);
      }
    });
  });

  describe('Rejected directories', () => {
    test('should reject an empty candidate', () => {
      const result = validator.validateDirectory('   ');

      expect(result).toEqual({
        isValid: false,
        candidate: '   ',
        error: 'Empty path not allowed',
        securityViolation: false
      });
    });

    test('should reject a candidate containing a null byte', () => {
      const result = validator.validateDirectory(`${home}\0/x`);

      expect(result.isValid).toBe(false);
      if (!result.isValid) {
        expect(result.securityViolation).toBe(true);
      }
    });

    test('should reject a missing directory', () => {
      const result = validator.validateDirectory(path.join(home, 'missing'));

      expect(result.isValid).toBe(false);
      if (!result.isValid) {
        expect(result.error).toBe('Path does not exist: ENOENT');
        expect(result.securityViolation).toBe(false);
      }
    });

    test('should reject a regular file', () => {
      const file = path.join(home, 'notes.txt');
      fs.writeFileSync(file, 'x');

      const result = validator.validateDirectory(file);

      expect(result.isValid).toBe(false);
      if (!result.isValid) {
        expect(result.error).toBe('Path is not a directory');
      }
    });

    test('should reject directories outside the allowed roots (default deny)', () => {
      const result = validator.validateDirectory(outside);

      expect(result.isValid).toBe(false);
      if (!result.isValid) {
        expect(result.error).toBe('Path outside allowed directories');
        expect(result.securityViolation).toBe(true);
      }
    });

    test('should reject a symlink inside home that points outside', () => {
      const link = path.join(home, 'escape');
      fs.symlinkSync(outside, link);

      const result = validator.validateDirectory(link);

      expect(result.isValid).toBe(false);
      if (!result.isValid) {
        expect(result.error).toBe('Path outside allowed directories');
      }
    });

    test('should not treat a sibling with a shared prefix as inside a root', () => {
      const sibling = `${home}-sibling`;
      fs.mkdirSync(sibling);
      try {
        expect(validator.validateDirectory(sibling).isValid).toBe(false);
      } finally {
        removeDir(sibling);
      }
    });
  });

  describe('Forbidden directories', () => {
    test('should reject /etc as an exact forbidden match', () => {
      const permissive = new PathValidator({ homeDirectory: home, allowedRoots: ['/'] });

      const result = permissive.validateDirectory('/etc');

      expect(result.isValid).toBe(false);
      if (!result.isValid) {
        expect(result.error).toBe('Access to system directory not allowed: /etc');
        expect(result.securityViolation).toBe(true);
      }
    });

    test('should reject a benign-looking symlink that resolves to a forbidden directory', () => {
      const forbidden = path.join(outside, 'secret');
      fs.mkdirSync(forbidden);
      const link = path.join(home, 'harmless');
      fs.symlinkSync(forbidden, link);

      const strict = new PathValidator({
        homeDirectory: home,
        allowedRoots: [tempRoot()],
        forbiddenDirectories: [forbidden]
      });

      const result = strict.validateDirectory(link);

      expect(result.isValid).toBe(false);
      if (!result.isValid) {
        expect(result.error).toBe(`Access to system directory not allowed: ${forbidden}`);
      }
    });

    test('should only forbid the exact directory, not its children', () => {
      const forbidden = path.join(home, 'locked');
      const child = path.join(forbidden, 'child');
      fs.mkdirSync(child, { recursive: true });

      const strict = new PathValidator({ homeDirectory: home, allowedRoots: [home], forbiddenDirectories: [forbidden] });

      expect(strict.validateDirectory(forbidden).isValid).toBe(false);
      expect(strict.validateDirectory(child).isValid).toBe(true);
    });
  });

  describe('Security events', () => {
    test('should record an event for a directory outside the roots', () => {
      validator.validateDirectory(outside);

      const events = validator.getSecurityEvents();
      expect(events).toHaveLength(1);
      expect(events[0]?.type).toBe('outside_allowed_roots');
      expect(events[0]?.resolvedPath).toBe(outside);
    });

    test('should not record events for ordinary failures', () => {
      validator.validateDirectory(path.join(home, 'missing'));
      expect(validator.getSecurityEvents()).toHaveLength(0);
    });

    test('should skip events when audit logging is disabled', () => {
      const quiet = new PathValidator({ homeDirectory: home, allowedRoots: [home], enableAuditLogging: false });
      quiet.validateDirectory(outside);
      expect(quiet.getSecurityEvents()).toHaveLength(0);
    });

    test('should clear recorded events', () => {
      validator.validateDirectory(outside);
      validator.clearSecurityEvents();
      expect(validator.getSecurityEvents()).toHaveLength(0);
    });
  });

  describe('Helpers', () => {
    test('should use home plus the shared roots by default', () => {
      const defaults = new PathValidator({ homeDirectory: home });
      const roots = defaults.getAllowedRoots();

      expect(roots).toContain(home);
      expect(roots).toContain('/tmp');
      expect(roots).toContain('/mnt');
    });

    test('should report existing directories', () => {
      expect(PathValidator.isExistingDirectory(home)).toBe(true);
      expect(PathValidator.isExistingDirectory(path.join(home, 'missing'))).toBe(false);
      expect(PathValidator.isExistingDirectory('')).toBe(false);
    });

    test('should create a validator for a given home directory', () => {
      const created = PathValidator.createForCurrentUser(undefined, home);
      expect(created.getHomeDirectory()).toBe(home);
    });
  });
});

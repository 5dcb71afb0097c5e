/**
 * file:// URI Helper Tests
 */

import { decodeFileUri, findQuotedFileUris } from '../fileUri';

describe('decodeFileUri', () => {
  test('should strip the scheme and percent-decode', () => {
    expect(decodeFileUri('file:///home/user/My%20Files')).toBe('/home/user/My Files');
  });

  test('should decode non-ASCII names', () => {
    expect(decodeFileUri('file:///home/user/M%C3%BAsica')).toBe('/home/user/Música');
  });

  test('should accept the localhost authority', () => {
    expect(decodeFileUri('file://localhost/tmp/work')).toBe('/tmp/work');
  });

  test('should reject other schemes and remote hosts', () => {
    expect(decodeFileUri('smb://server/share')).toBeNull();
    expect(decodeFileUri('file://server/share')).toBeNull();
  });

  test('should reject malformed escapes and null bytes', () => {
    expect(decodeFileUri('file:///tmp/%E0%A4%A')).toBeNull();
    expect(decodeFileUri('file:///tmp/a%00b')).toBeNull();
  });
});

describe('findQuotedFileUris', () => {
  test('should return every quoted URI in order', () => {
    const output = `(<'file:///home/a'>,) "label file:///home/b"`;

    expect(findQuotedFileUris(output)).toEqual(['file:///home/a', 'file:///home/b']);
  });

  test('should ignore unquoted URIs', () => {
    expect(findQuotedFileUris('file:///home/a')).toEqual([]);
  });
});

// Property-based tests for attachment integrity checks
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { checkAttachment } from '../src/shared/utils/file-integrity';
import { sanitize } from '../src/shared/utils/sanitize';
import { jpegBytes, makeAttachment, pdfBytes } from './fixtures';

// First bytes of the JPEG, PNG and RIFF signatures
const SIGNATURE_LEADS = [0xff, 0x89, 0x52];

describe('File Integrity Properties', () => {
  it('should reject any image whose bytes carry no known signature', () => {
    fc.assert(
      fc.property(
        fc.uint8Array({ minLength: 1, maxLength: 256 }).filter(bytes => !SIGNATURE_LEADS.includes(bytes[0])),
        fc.constantFrom('photo.jpg', 'photo.jpeg', 'photo.png', 'photo.webp'),
        (bytes, filename) => {
          const verdict = checkAttachment(makeAttachment(filename, 'image', Buffer.from(bytes)));

          expect(verdict.isValid).toBe(false);
          expect(verdict.reason).toBe('Unrecognized image format (expected JPEG, PNG or WebP)');
        }
      )
    );
  });

  it('should count one page per page object', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 40 }), pages => {
        const verdict = checkAttachment(makeAttachment('quote.pdf', 'document', pdfBytes(pages)));

        expect(verdict.isValid).toBe(true);
        expect(verdict.pageCount).toBe(pages);
      })
    );
  });

  it('should still accept valid JPEG content under a hostile path once the name is sanitized', () => {
    fc.assert(
      fc.property(
        fc.array(fc.constantFrom('..', 'etc', 'tmp', '.', 'C:', 'uploads'), { maxLength: 6 }),
        fc.constantFrom('/', '\\'),
        fc.stringMatching(/^[a-z0-9]{1,12}$/),
        (segments, separator, stem) => {
          const name = sanitize([...segments, `${stem}.jpg`].join(separator), 'filename');

          expect(name).toEqual({ ok: true, value: `${stem}.jpg` });
          if (name.ok) {
            expect(checkAttachment(makeAttachment(name.value, 'image', jpegBytes())).isValid).toBe(true);
          }
        }
      )
    );
  });
});

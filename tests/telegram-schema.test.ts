import { describe, it, expect } from 'vitest';
import { parseUpdatesResponse, toMessage, toUpdate } from '../src/core/telegram-schema.js';
import { extractURL } from '../src/core/url-extractor.js';

describe('telegram schema', () => {
  describe('toMessage', () => {
    it('should default missing entities to an empty list', () => {
      expect(toMessage({ message_id: 3, text: 'hi' })).toEqual({
        messageId: 3,
        text: 'hi',
        entities: [],
      });
    });

    it('should default missing text to an empty string', () => {
      expect(toMessage({ message_id: 4 }).text).toBe('');
    });

    it('should decode a url entity without a url field as an empty link', () => {
      const decoded = toMessage({
        message_id: 5,
        text: 'see https://a.example now',
        entities: [{ type: 'url', offset: 4, length: 17 }],
      });

      expect(decoded.entities).toEqual([
        { kind: 'url', offset: 4, length: 17, url: '' },
      ]);
    });

    it('should keep the first url entity empty even when a later one has a url', () => {
      const decoded = toMessage({
        message_id: 8,
        text: 'see https://a.example',
        entities: [
          { type: 'url', offset: 4, length: 17 },
          { type: 'url', offset: 4, length: 17, url: 'https://b.example' },
        ],
      });

      expect(extractURL(decoded)).toBe('');
    });

    it('should drop the url of a non-url entity', () => {
      const decoded = toMessage({
        message_id: 6,
        text: 'click',
        entities: [{ type: 'text_link', offset: 0, length: 5, url: 'https://hidden.example' }],
      });

      expect(decoded.entities).toEqual([
        { kind: 'annotation', type: 'text_link', offset: 0, length: 5 },
      ]);
    });
  });

  describe('toUpdate', () => {
    it('should leave message out when the update has none', () => {
      expect(toUpdate({ update_id: 9, message: null })).toEqual({ updateId: 9 });
      expect(toUpdate({ update_id: 10 })).toEqual({ updateId: 10 });
    });
  });

  describe('parseUpdatesResponse', () => {
    it('should reject a body without ok', () => {
      const result = parseUpdatesResponse({ result: [] });

      expect(result.success).toBe(false);
    });

    it('should reject a non-object body', () => {
      expect(parseUpdatesResponse('ok').success).toBe(false);
      expect(parseUpdatesResponse(null).success).toBe(false);
    });

    it('should report error code and description for ok false', () => {
      expect(parseUpdatesResponse({ ok: false, error_code: 409, description: 'Conflict' })).toEqual({
        success: true,
        data: { ok: false, errorCode: 409, description: 'Conflict' },
      });
    });

    it('should use null for a missing error code and description', () => {
      expect(parseUpdatesResponse({ ok: false })).toEqual({
        success: true,
        data: { ok: false, errorCode: null, description: null },
      });
    });
  });
});

import {
  describeProcessingFailure,
  errorMessage,
} from './processing-error.util';

describe('processing-error.util', () => {
  describe('errorMessage', () => {
    it('should use the message of an Error', () => {
      expect(errorMessage(new Error('deadline exceeded'))).toBe(
        'deadline exceeded',
      );
    });

    it('should stringify anything else', () => {
      expect(errorMessage('plain failure')).toBe('plain failure');
      expect(errorMessage(42)).toBe('42');
    });
  });

  describe('describeProcessingFailure', () => {
    it('should explain NOT_FOUND', () => {
      const error = Object.assign(new Error('5 NOT_FOUND: processor'), {
        code: 5,
      });

      expect(describeProcessingFailure(error)).toBe(
        'Processor not found. Please verify PROJECT_ID, LOCATION, PROCESSOR_ID and PROCESSOR_VERSION.',
      );
    });

    it('should explain PERMISSION_DENIED', () => {
      expect(describeProcessingFailure({ code: 7 })).toContain(
        'roles/documentai.apiUser',
      );
    });

    it('should return undefined for unknown codes', () => {
      expect(describeProcessingFailure({ code: 14 })).toBeUndefined();
    });

    it('should return undefined for errors without a status code', () => {
      expect(describeProcessingFailure(new Error('boom'))).toBeUndefined();
      expect(describeProcessingFailure({ code: 'ENOENT' })).toBeUndefined();
      expect(describeProcessingFailure(null)).toBeUndefined();
    });
  });
});

import { resolveSubmissionStatus } from './status_resolver';

describe('resolveSubmissionStatus', () => {
  it('should resolve an open pull request to Pending', () => {
    expect(resolveSubmissionStatus('open', null)).toBe('Pending');
  });

  it('should resolve an open pull request to Pending even when merged_at is set', () => {
    expect(resolveSubmissionStatus('open', '2024-03-01T10:00:00Z')).toBe('Pending');
  });

  it('should resolve a closed pull request with merged_at to Merged', () => {
    expect(resolveSubmissionStatus('closed', '2024-03-01T10:00:00Z')).toBe('Merged');
    expect(resolveSubmissionStatus('closed', new Date('2024-03-01T10:00:00Z'))).toBe('Merged');
  });

  it('should resolve a closed pull request without merged_at to Rejected', () => {
    expect(resolveSubmissionStatus('closed', null)).toBe('Rejected');
    expect(resolveSubmissionStatus('closed', undefined)).toBe('Rejected');
  });

  it('should treat any non-open state like closed', () => {
    expect(resolveSubmissionStatus('locked', '2024-03-01T10:00:00Z')).toBe('Merged');
    expect(resolveSubmissionStatus('locked', null)).toBe('Rejected');
  });
});

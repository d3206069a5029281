import { isExtractionCandidate, scoreSchedulingSignals } from './classifier';

describe('Classifier', () => {
  describe('scoreSchedulingSignals', () => {
    it('should score a placement interview invitation', () => {
      const result = scoreSchedulingSignals({
        subject: 'Interview invitation: Acme Corp',
        from: 'placement-cell@college.edu',
        body: 'You have been shortlisted for the technical round on Monday at 10:00.',
      });

      expect(result.score).toBe(60);
      expect(result.hint).toBe('interview');
      expect(result.reasons).toEqual([
        'Interview keyword in subject: interview',
        'Interview keyword in body',
        'Placement/recruiting sender',
        'Time markers: clock time, weekday',
      ]);
    });

    it('should score a class reschedule notice from a department', () => {
      const result = scoreSchedulingSignals({
        subject: 'DBMS class rescheduled',
        from: 'cse-dept@college.edu',
        body: 'The DBMS lecture is moved to Friday 14:00-15:00.',
      });

      expect(result.score).toBe(60);
      expect(result.hint).toBe('reschedule');
      expect(result.reasons).toContain('Reschedule keyword in subject: rescheduled, reschedule');
      expect(result.reasons).toContain('Academic sender');
    });

    it('should prefer the interview hint on a tie', () => {
      const result = scoreSchedulingSignals({
        subject: 'Interview rescheduled',
        from: 'someone@example.com',
        body: '',
      });

      expect(result.score).toBe(25);
      expect(result.hint).toBe('interview');
    });

    it('should give nothing to unrelated mail', () => {
      const result = scoreSchedulingSignals({
        subject: 'Campus newsletter',
        from: 'news@college.edu',
        body: 'Read about the new library wing.',
      });

      expect(result.score).toBe(0);
      expect(result.hint).toBeNull();
      expect(result.reasons).toEqual([]);
    });

    it('should only add the time marker bonus for two or more markers', () => {
      const one = scoreSchedulingSignals({ subject: 'Interview', from: 'a@example.com', body: 'See you at 10:00' });
      const two = scoreSchedulingSignals({ subject: 'Interview', from: 'a@example.com', body: 'See you 2024-05-06 at 10:00' });

      expect(one.score).toBe(25);
      expect(two.score).toBe(35);
    });
  });

  describe('isExtractionCandidate', () => {
    it('should accept messages at or above the threshold', () => {
      expect(
        isExtractionCandidate(
          scoreSchedulingSignals({
            subject: 'Quick update',
            from: 'recruit@acme.com',
            body: 'Please confirm your interview slot.',
          })
        )
      ).toBe(true);
    });

    it('should reject weak signals', () => {
      expect(
        isExtractionCandidate(
          scoreSchedulingSignals({
            subject: 'Hello',
            from: 'friend@example.com',
            body: 'How did the interview go?',
          })
        )
      ).toBe(false);
    });
  });
});

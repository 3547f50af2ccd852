/**
 * Tests for page break markers
 */

import { describe, it, expect } from 'vitest';
import { convertMarkdown } from '../pipeline';

describe('page breaks', () => {
    it('converts page break tags', () => {
        expect(convertMarkdown('A\n<newpage>\nB\n<CLEARPAGE/>').latex).toBe('A\n\\newpage\nB\n\\clearpage');
    });
});

// =============================================================================
// Unit tests — prompt assembly (lib/aiContext.ts)
// =============================================================================

import { describe, it, expect } from 'vitest';
import { buildAnalysisContext, buildAnalysisPrompt, formatOneDecimal } from './aiContext';

describe('formatOneDecimal', () => {
    it('rounds to one decimal place', () => {
        expect(formatOneDecimal(46.6666)).toBe('46.7');
        expect(formatOneDecimal(60)).toBe('60.0');
    });
});

describe('buildAnalysisContext', () => {
    it('renders the summary as four fixed lines', () => {
        const context = buildAnalysisContext({
            total_employees: 3,
            average_sentiment: 140 / 3,
            quadrant_distribution: { 'Champion': 1, 'At Risk': 2 },
            sentiment_by_role: { Engineer: 80, Sales: 30 },
        });

        expect(context).toBe([
            'Total Employees: 3',
            'Average Sentiment: 46.7%',
            'Quadrant Distribution: Champion: 1, At Risk: 2',
            'Sentiment by Role: Engineer: 80.0%, Sales: 30.0%',
        ].join('\n'));
    });

    it('leaves the distribution lines blank for an empty summary', () => {
        const context = buildAnalysisContext({
            total_employees: 0,
            average_sentiment: 0,
            quadrant_distribution: {},
            sentiment_by_role: {},
        });
        expect(context.split('\n')).toEqual([
            'Total Employees: 0',
            'Average Sentiment: 0.0%',
            'Quadrant Distribution: ',
            'Sentiment by Role: ',
        ]);
    });
});

describe('buildAnalysisPrompt', () => {
    it('wraps the question with the context block', () => {
        expect(buildAnalysisPrompt('Who is at risk?', 'Total Employees: 1')).toBe(
            'Context:\nTotal Employees: 1\n\nQuestion: Who is at risk?\n\nProvide a detailed analysis.',
        );
    });
});

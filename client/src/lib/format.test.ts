import { describe, it, expect } from 'vitest';
import {
    countFor,
    formatPercent,
    quadrantChartData,
    quadrantColor,
    roleBarColor,
    roleChartData,
    sentimentHint,
} from './format';

describe('formatPercent', () => {
    it('rounds to one decimal by default', () => {
        expect(formatPercent(46.666)).toBe('46.7%');
        expect(formatPercent(0)).toBe('0.0%');
    });

    it('takes a digit count', () => {
        expect(formatPercent(72.345, 0)).toBe('72%');
    });
});

describe('sentimentHint', () => {
    it('is Healthy strictly above 60', () => {
        expect(sentimentHint(60.1)).toBe('Healthy');
        expect(sentimentHint(60)).toBe('Needs attention');
    });
});

describe('quadrantColor', () => {
    it('has a fixed colour per category and a neutral one for other labels', () => {
        expect(quadrantColor('Champion')).toBe('#28a745');
        expect(quadrantColor('At Risk')).toBe('#dc3545');
        expect(quadrantColor('Wildcard')).toBe('#64748b');
    });

    it('does not resolve Object.prototype members as colours', () => {
        expect(quadrantColor('constructor')).toBe('#64748b');
        expect(quadrantColor('toString')).toBe('#64748b');
    });
});

describe('roleBarColor', () => {
    it('uses strict thresholds at 70 and 50', () => {
        expect(roleBarColor(70.5)).toBe('#28a745');
        expect(roleBarColor(70)).toBe('#ffc107');
        expect(roleBarColor(50.5)).toBe('#ffc107');
        expect(roleBarColor(50)).toBe('#dc3545');
    });
});

describe('quadrantChartData', () => {
    it('orders known categories by threshold and appends others', () => {
        expect(quadrantChartData({ 'At Risk': 2, 'Wildcard': 1, 'Champion': 3 })).toEqual([
            { name: 'Champion', value: 3, color: '#28a745' },
            { name: 'At Risk', value: 2, color: '#dc3545' },
            { name: 'Wildcard', value: 1, color: '#64748b' },
        ]);
    });

    it('is empty for an empty distribution', () => {
        expect(quadrantChartData({})).toEqual([]);
    });
});

describe('roleChartData', () => {
    it('sorts roles by score, highest first', () => {
        expect(roleChartData({ Sales: 30, Engineer: 80, Design: 55 })).toEqual([
            { role: 'Engineer', score: 80, label: '80.0%', color: '#28a745' },
            { role: 'Design', score: 55, label: '55.0%', color: '#ffc107' },
            { role: 'Sales', score: 30, label: '30.0%', color: '#dc3545' },
        ]);
    });
});

describe('countFor', () => {
    it('defaults to 0 for absent labels', () => {
        expect(countFor({ Champion: 4 }, 'Champion')).toBe(4);
        expect(countFor({ Champion: 4 }, 'At Risk')).toBe(0);
    });
});

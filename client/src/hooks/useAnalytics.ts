// hooks/useAnalytics.ts — page-level data hooks over api/analytics.ts.

import { useEffect } from 'react';
import { fetchEmployees, fetchStatus, fetchSummary } from '../api/analytics';
import type { AnalyticsSummary, ApiStatus, EmployeeRecord } from '../api/analytics';
import { useResource } from './useResource';
import type { ResourceState } from './useResource';

const STATUS_POLL_MS = 30_000;

export function useSummary(): ResourceState<AnalyticsSummary> {
    return useResource(fetchSummary);
}

/** `quadrant` undefined → all records. */
export function useEmployees(quadrant?: string): ResourceState<EmployeeRecord[]> {
    return useResource(() => fetchEmployees(quadrant), quadrant ?? '');
}

/** API status, re-polled every 30 s for the sidebar indicator. */
export function useStatus(): ResourceState<ApiStatus> {
    const state = useResource(fetchStatus);
    const { refetch } = state;

    useEffect(() => {
        const id = setInterval(refetch, STATUS_POLL_MS);
        return () => clearInterval(id);
    }, [refetch]);

    return state;
}

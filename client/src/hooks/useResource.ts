// hooks/useResource.ts — loading / error / refetch state around one fetcher.
// refetch() bumps a tick; the effect re-runs on tick or key changes.

import { useState, useEffect, useCallback } from 'react';
import { toApiRequestError } from '../api/client';
import type { ApiRequestError } from '../api/client';

export interface ResourceState<T> {
    data: T | null;
    loading: boolean;
    error: ApiRequestError | null;
    refetch: () => void;
}

export function useResource<T>(fetcher: () => Promise<T>, key = ''): ResourceState<T> {
    const [data, setData] = useState<T | null>(null);
    const [loading, setLoading] = useState(true);
    const [error, setError] = useState<ApiRequestError | null>(null);
    const [tick, setTick] = useState(0);

    useEffect(() => {
        let cancelled = false;
        setLoading(true);
        setError(null);

        fetcher()
            .then(d => { if (!cancelled) { setData(d); setLoading(false); } })
            .catch((e: unknown) => {
                if (!cancelled) { setData(null); setError(toApiRequestError(e)); setLoading(false); }
            });

        return () => { cancelled = true; };
        // fetcher identity changes every render; `key` carries its inputs
        // eslint-disable-next-line react-hooks/exhaustive-deps
    }, [tick, key]);

    const refetch = useCallback(() => setTick(t => t + 1), []);

    return { data, loading, error, refetch };
}

// pages/EmployeesPage.tsx — record list with quadrant filter chips (/employees).
// The selected chip lives in ?quadrant= so a filtered view can be linked.

import { useSearchParams } from 'react-router-dom';
import { QUADRANTS } from '../api/analytics';
import { useEmployees } from '../hooks/useAnalytics';
import { EmployeeTable } from '../components/dashboard/EmployeeTable';
import { ErrorState, PageHeader, Skeleton } from '../components/ui';
import { quadrantColor } from '../lib/format';

export default function EmployeesPage() {
    const [params, setParams] = useSearchParams();
    const quadrant = params.get('quadrant') ?? undefined;
    const { data: employees, loading, error, refetch } = useEmployees(quadrant);

    function select(next?: string) {
        setParams(next ? { quadrant: next } : {});
    }

    const chips: { label: string; value?: string }[] = [
        { label: 'All' },
        ...QUADRANTS.map(q => ({ label: q, value: q })),
    ];

    return (
        <>
            <PageHeader
                title="Employees"
                subtitle={employees ? `${employees.length} records${quadrant ? ` in ${quadrant}` : ''}` : undefined}
            />

            <div className="flex flex-wrap gap-2 mb-6" role="tablist" aria-label="Filter by quadrant">
                {chips.map(chip => {
                    const active = chip.value === quadrant;
                    const color = chip.value ? quadrantColor(chip.value) : '#6366f1';
                    return (
                        <button
                            key={chip.label}
                            type="button"
                            role="tab"
                            aria-selected={active}
                            onClick={() => select(chip.value)}
                            className={`px-3 py-1.5 rounded-full text-xs font-medium border transition-colors
                                ${active ? 'text-white' : 'text-slate-400 border-slate-700 hover:text-slate-200 hover:border-slate-500'}`}
                            style={active ? { background: `${color}33`, borderColor: color } : undefined}
                        >
                            {chip.label}
                        </button>
                    );
                })}
            </div>

            {loading && !employees && <Skeleton className="h-96" />}
            {error && <ErrorState error={error} onRetry={refetch} />}
            {employees && <EmployeeTable employees={employees} />}
        </>
    );
}

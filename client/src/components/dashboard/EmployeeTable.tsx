// components/dashboard/EmployeeTable.tsx — record list used by the Employees
// page and the AI Insights quick actions.

import { formatPercent } from '../../lib/format';
import type { EmployeeRecord } from '../../api/analytics';
import { QuadrantBadge } from '../ui';

export function EmployeeTable({ employees }: { employees: EmployeeRecord[] }) {
    if (employees.length === 0) {
        return (
            <div className="rounded-2xl border border-slate-800 bg-slate-900 p-8 text-center text-sm text-slate-500">
                No employees in this category.
            </div>
        );
    }

    return (
        <div className="overflow-x-auto rounded-2xl border border-slate-800">
            <table className="w-full text-sm">
                <thead className="bg-slate-900 text-left text-[10px] uppercase tracking-widest text-slate-500">
                    <tr>
                        <th className="px-4 py-3 font-semibold">ID</th>
                        <th className="px-4 py-3 font-semibold">Name</th>
                        <th className="px-4 py-3 font-semibold">Role</th>
                        <th className="px-4 py-3 font-semibold text-right">Sentiment</th>
                        <th className="px-4 py-3 font-semibold">Quadrant</th>
                        <th className="px-4 py-3 font-semibold">Analysis</th>
                    </tr>
                </thead>
                <tbody className="divide-y divide-slate-800/70">
                    {employees.map(e => (
                        <tr key={`${e.id}-${e.employee_name}`} className="hover:bg-slate-900/60 align-top">
                            <td className="px-4 py-3 tabular-nums text-slate-500">{e.employee_id}</td>
                            <td className="px-4 py-3 font-medium text-slate-200 whitespace-nowrap">{e.employee_name}</td>
                            <td className="px-4 py-3 text-slate-400 whitespace-nowrap">{e.role}</td>
                            <td className="px-4 py-3 text-right tabular-nums text-slate-200">{formatPercent(e.sentiment_score)}</td>
                            <td className="px-4 py-3"><QuadrantBadge quadrant={e.quadrant} /></td>
                            <td className="px-4 py-3 text-slate-400 max-w-md">
                                <p className="line-clamp-3" title={e.content}>{e.content || '—'}</p>
                            </td>
                        </tr>
                    ))}
                </tbody>
            </table>
        </div>
    );
}

import { Outlet } from 'react-router-dom';
import { Sidebar } from './Sidebar';

export function AppLayout() {
    return (
        <div className="flex min-h-screen bg-slate-950">
            <Sidebar />
            {/* pt-14 = mobile top-bar height */}
            <main className="flex-1 overflow-y-auto pt-14 md:pt-0">
                <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8">
                    <Outlet />
                </div>
            </main>
        </div>
    );
}

// =============================================================================
// App.tsx — root component: router + layout + toast container
// =============================================================================

import { BrowserRouter, Routes, Route, Navigate } from 'react-router-dom';
import { Toaster } from 'react-hot-toast';
import { AppLayout } from './components/layout/AppLayout';
import OverviewPage from './pages/OverviewPage';
import EmployeesPage from './pages/EmployeesPage';
import InsightsPage from './pages/InsightsPage';

// ─── Router ───────────────────────────────────────────────────────────────────

function AppRouter() {
    return (
        <Routes>
            <Route path="/" element={<Navigate to="/overview" replace />} />

            <Route element={<AppLayout />}>
                <Route path="/overview"  element={<OverviewPage />} />
                <Route path="/employees" element={<EmployeesPage />} />
                <Route path="/insights"  element={<InsightsPage />} />
            </Route>

            {/* 404 fallback */}
            <Route
                path="*"
                element={
                    <div className="min-h-dvh flex flex-col items-center justify-center gap-4">
                        <p className="text-6xl font-black text-slate-800">404</p>
                        <p className="text-slate-400">Page not found.</p>
                        <a href="/overview" className="btn-ghost">Go to overview →</a>
                    </div>
                }
            />
        </Routes>
    );
}

// ─── App (root) ───────────────────────────────────────────────────────────────

export default function App() {
    return (
        <BrowserRouter>
            <AppRouter />

            <Toaster
                position="top-right"
                toastOptions={{
                    style: {
                        background:   '#1e293b',   // slate-800
                        color:        '#f1f5f9',   // slate-100
                        border:       '1px solid #334155',  // slate-700
                        borderRadius: '12px',
                        fontSize:     '14px',
                    },
                    success: {
                        iconTheme: { primary: '#6366f1', secondary: '#fff' },
                    },
                    error: {
                        iconTheme: { primary: '#ef4444', secondary: '#fff' },
                    },
                }}
            />
        </BrowserRouter>
    );
}

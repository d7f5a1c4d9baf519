/**
 * Main App component with routing
 */

import { Routes, Route, Link, useLocation, useNavigate } from 'react-router-dom';
import { ErrorBoundary } from './components/ErrorBoundary';
import { StudioView } from './components/StudioView';
import { PresetGallery } from './pages/PresetGallery';
import './App.css';

type Section = 'studio' | 'gallery';

const SECTIONS: ReadonlyArray<{ id: Section; path: string; label: string }> = [
    { id: 'studio', path: '/', label: 'Studio' },
    { id: 'gallery', path: '/gallery', label: 'Gallery' },
];

function ViewToggle({ active }: { active: Section }) {
    const navigate = useNavigate();

    return (
        <div className="view-toggle">
            {SECTIONS.map(section => (
                <button
                    key={section.id}
                    onClick={() => navigate(section.path)}
                    className={`view-toggle-btn ${active === section.id ? 'active' : ''}`}
                >
                    {section.label}
                </button>
            ))}
        </div>
    );
}

function NavBar() {
    const location = useLocation();
    const active: Section = location.pathname === '/gallery' ? 'gallery' : 'studio';

    return (
        <nav className="navbar">
            <Link to="/" className="brand">
                <div className="brand-mark" aria-hidden>ψ</div>
                <span>L-System Studio</span>
            </Link>
            <ViewToggle active={active} />
        </nav>
    );
}

function App() {
    return (
        <ErrorBoundary>
            <div style={{ minHeight: '100vh', display: 'flex', flexDirection: 'column' }}>
                <NavBar />
                <div style={{ flex: 1 }}>
                    <Routes>
                        <Route path="/" element={<StudioView />} />
                        <Route path="/gallery" element={<PresetGallery />} />
                    </Routes>
                </div>
            </div>
        </ErrorBoundary>
    );
}

export default App;

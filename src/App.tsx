import './App.css'
import { Routes, Route, Link, Navigate, useLocation } from 'react-router-dom'
import LibraryPage from './pages/LibraryPage'
import PaperPage from './pages/PaperPage'
import UploadPage from './pages/UploadPage'
import LoginPage from './pages/LoginPage'
import { useAdminSession } from './components/sessionContext'
import { useFlash } from './components/flashContext'

function App() {
  const { session, signOut } = useAdminSession()
  const { flash } = useFlash()
  const location = useLocation()

  function handleSessionExpired() {
    signOut()
    flash('Your admin session has expired. Please sign in again.', 'warning')
  }

  const loginTarget = `/admin/login?next=${encodeURIComponent(location.pathname)}`

  return (
    <div className="app-shell">
      <header className="app-header">
        <div className="app-brand">
          <div className="brand-mark" aria-hidden />
          <div>
            <Link to="/" className="brand-title">
              Exam Paper Archive
            </Link>
            <p className="brand-subtitle">Past mid- and end-semester papers by year, semester and subject.</p>
          </div>
        </div>
        <nav className="app-nav">
          <Link to="/" className="nav-link">
            Papers
          </Link>
          {session ? (
            <>
              <Link to="/upload" className="nav-link">
                Upload
              </Link>
              <button type="button" className="btn btn-ghost btn-compact" onClick={signOut}>
                Log out
              </button>
            </>
          ) : (
            <Link to="/admin/login" className="nav-link">
              Admin login
            </Link>
          )}
        </nav>
      </header>
      <main className="app-main">
        <Routes>
          <Route path="/" element={<LibraryPage />} />
          <Route path="/papers/:id" element={<PaperPage />} />
          <Route
            path="/upload"
            element={
              session ? (
                <UploadPage session={session} onSessionExpired={handleSessionExpired} />
              ) : (
                <Navigate to={loginTarget} replace />
              )
            }
          />
          <Route path="/admin/login" element={<LoginPage />} />
          <Route path="*" element={<Navigate to="/" replace />} />
        </Routes>
      </main>
    </div>
  )
}

export default App

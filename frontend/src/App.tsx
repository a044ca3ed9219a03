import { Routes, Route, NavLink } from "react-router-dom";
import RatingPage from "./pages/RatingPage";
import SummaryPage from "./pages/SummaryPage";
import ErrorBoundary from "./components/ErrorBoundary";

function App() {
  return (
    <div className="container">
      <div className="header">
        <h1>Image Rater</h1>
        <nav>
          <NavLink to="/" end>
            Rate
          </NavLink>
          <NavLink to="/summary">Summary</NavLink>
        </nav>
      </div>

      <Routes>
        <Route
          path="/"
          element={
            <ErrorBoundary>
              <RatingPage />
            </ErrorBoundary>
          }
        />
        <Route path="/summary" element={<SummaryPage />} />
      </Routes>
    </div>
  );
}

export default App;

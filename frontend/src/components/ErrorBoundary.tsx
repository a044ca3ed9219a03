import { Component, type ErrorInfo, type ReactNode } from "react";

interface Props {
  children: ReactNode;
  fallback?: ReactNode;
}

interface State {
  hasError: boolean;
  error?: Error;
}

/**
 * ErrorBoundary component for render errors.
 *
 * Keeps a crash in the rating view from blanking the page; the datastore
 * already holds every confirmed rating, so reloading resumes where the
 * session left off.
 *
 * Usage:
 *   <ErrorBoundary>
 *     <RatingPage />
 *   </ErrorBoundary>
 */
export default class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { hasError: false };
  }

  static getDerivedStateFromError(error: Error): State {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error("ErrorBoundary caught error:", error, errorInfo.componentStack);
  }

  render() {
    if (this.state.hasError) {
      return (
        this.props.fallback || (
          <div className="card" style={{ textAlign: "center", padding: "40px" }}>
            <h2>The rating view crashed</h2>
            <p style={{ color: "#666", marginBottom: "20px" }}>
              {this.state.error?.message || "An unexpected error occurred"}
            </p>
            <button
              className="button"
              onClick={() => window.location.reload()}
              style={{ fontSize: "16px", padding: "10px 20px" }}
            >
              Resume session
            </button>
          </div>
        )
      );
    }

    return this.props.children;
  }
}

import { useState, useEffect } from "react";
import { Link } from "react-router-dom";
import { apiErrorBody, reportApi } from "../services/api";
import type { Summary } from "../types";

export const EXPORT_FILENAME = "annotations_export.json";

export default function SummaryPage() {
  const [summary, setSummary] = useState<Summary | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let isCancelled = false;

    const loadSummary = async () => {
      try {
        const response = await reportApi.summary();
        if (!isCancelled) {
          setSummary(response.data);
        }
      } catch (err) {
        if (!isCancelled) {
          setError(apiErrorBody(err)?.detail ?? "Failed to load the summary");
        }
      } finally {
        if (!isCancelled) {
          setLoading(false);
        }
      }
    };

    void loadSummary();

    return () => {
      isCancelled = true;
    };
  }, []);

  const handleExport = async () => {
    try {
      const response = await reportApi.export();
      const blob = new Blob([JSON.stringify(response.data, null, 2)], {
        type: "application/json",
      });
      const url = URL.createObjectURL(blob);
      const a = document.createElement("a");
      a.href = url;
      a.download = EXPORT_FILENAME;
      a.click();
      URL.revokeObjectURL(url);
    } catch (err) {
      setError(apiErrorBody(err)?.detail ?? "Failed to export annotations");
    }
  };

  if (loading) {
    return <div className="loading">Loading summary...</div>;
  }

  if (error) {
    return <div className="error">{error}</div>;
  }

  if (!summary) {
    return <div className="error">Summary not available</div>;
  }

  const ratings = Object.entries(summary.rating_distribution).sort(
    ([a], [b]) => Number(a) - Number(b),
  );

  return (
    <div className="card">
      <Link to="/">&larr; Back to rating</Link>
      <h2>Annotation summary</h2>
      <p>Records: {summary.total_records}</p>
      <p>Unrated: {summary.unrated}</p>
      <p>Marked: {summary.marked}</p>
      <p>Annotators: {summary.annotators.length > 0 ? summary.annotators.join(", ") : "none"}</p>

      <h3>Rating distribution</h3>
      {ratings.length === 0 ? (
        <p>No ratings yet.</p>
      ) : (
        <table className="summary-table">
          <thead>
            <tr>
              <th>Rating</th>
              <th>Images</th>
            </tr>
          </thead>
          <tbody>
            {ratings.map(([rating, count]) => (
              <tr key={rating}>
                <td>{rating}</td>
                <td>{count}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}

      <button
        className="button"
        onClick={() => void handleExport()}
        disabled={summary.total_records === 0}
      >
        Export Annotations
      </button>
    </div>
  );
}

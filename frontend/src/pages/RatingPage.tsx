import { useState, useEffect, useCallback, useRef } from "react";
import type { AxiosResponse } from "axios";
import { apiErrorBody, performAction, sessionApi } from "../services/api";
import type { SessionAction, SessionView } from "../types";
import { actionForKey, isEditableTarget } from "../utils/shortcuts";
import AnnotatorField from "../components/AnnotatorField";
import ImageViewer from "../components/rating/ImageViewer";
import ProgressHeader from "../components/rating/ProgressHeader";
import RatingButtons from "../components/rating/RatingButtons";
import ImageSkeleton from "../components/ImageSkeleton";

export const ANNOTATOR_STORAGE_KEY = "image-rater.annotator";

const SAVE_FAILED = "Failed to save. Your position is unchanged, try again.";

export default function RatingPage() {
  const [view, setView] = useState<SessionView | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const [notice, setNotice] = useState<string | null>(null);
  const [submitting, setSubmitting] = useState(false);
  const [username, setUsername] = useState<string>(
    () => window.localStorage.getItem(ANNOTATOR_STORAGE_KEY) ?? "",
  );

  // One request at a time: a second keypress while a save is in flight is dropped
  const inFlight = useRef(false);

  useEffect(() => {
    let isCancelled = false;

    const loadSession = async () => {
      try {
        const response = await sessionApi.get();
        if (!isCancelled) {
          setView(response.data);
        }
      } catch (err) {
        if (!isCancelled) {
          setError(apiErrorBody(err)?.detail ?? "Failed to load the session");
        }
      } finally {
        if (!isCancelled) {
          setLoading(false);
        }
      }
    };

    void loadSession();

    return () => {
      isCancelled = true;
    };
  }, []);

  const title = view?.title;

  useEffect(() => {
    if (title) {
      document.title = title;
    }
  }, [title]);

  const run = useCallback(
    async (request: () => Promise<AxiosResponse<SessionView>>) => {
      if (inFlight.current) return;
      inFlight.current = true;
      setSubmitting(true);
      setError(null);
      setNotice(null);
      try {
        const response = await request();
        setView(response.data);
      } catch (err) {
        const body = apiErrorBody(err);
        if (body?.code === "nothing_to_undo") {
          setNotice(body.detail);
        } else {
          setError(body?.detail ?? SAVE_FAILED);
        }
      } finally {
        inFlight.current = false;
        setSubmitting(false);
      }
    },
    [],
  );

  const dispatch = useCallback(
    (action: SessionAction) => run(() => performAction(action, username || undefined)),
    [run, username],
  );

  const numClasses = view?.num_classes;

  useEffect(() => {
    if (numClasses === undefined) return;

    const handleKeyDown = (e: KeyboardEvent) => {
      if (e.ctrlKey || e.metaKey || e.altKey) return;
      if (isEditableTarget(e.target)) return;

      const action = actionForKey(e.key, numClasses);
      if (!action) return;
      e.preventDefault();
      void dispatch(action);
    };

    window.addEventListener("keydown", handleKeyDown);
    return () => window.removeEventListener("keydown", handleKeyDown);
  }, [numClasses, dispatch]);

  const handleUsernameChange = (name: string) => {
    if (name) {
      window.localStorage.setItem(ANNOTATOR_STORAGE_KEY, name);
    } else {
      window.localStorage.removeItem(ANNOTATOR_STORAGE_KEY);
    }
    setUsername(name);
  };

  if (loading) {
    return (
      <div className="card">
        <h2>Loading session...</h2>
        <ImageSkeleton />
      </div>
    );
  }

  if (!view) {
    return <div className="error">{error || "Session not available"}</div>;
  }

  return (
    <div className="card rating-page">
      <h2>{view.title}</h2>

      <ProgressHeader
        view={view}
        onToggleFilter={() => void run(sessionApi.toggleFilter)}
        disabled={submitting}
      />

      {error && (
        <div className="annotation-error" role="alert">
          <strong>Error:</strong> {error}
        </div>
      )}
      {notice && (
        <div className="annotation-notice" role="status">
          {notice}
        </div>
      )}

      <div className="progress">Current: {view.image_identifier}</div>

      <ImageViewer
        key={view.image_identifier}
        src={view.image_url}
        identifier={view.image_identifier}
        marked={view.marked}
      />

      {view.description && <div className="description">{view.description}</div>}

      <div className="controls">
        <div className="current-rating">
          Current Rating: <span>{view.rating > 0 ? view.rating : "Not rated"}</span>
        </div>

        <div className="rating-row">
          <RatingButtons
            numClasses={view.num_classes}
            current={view.rating}
            onRate={(rating) => void dispatch({ type: "rate", rating })}
            disabled={submitting}
          />
          <label className="mark-label">
            <input
              type="checkbox"
              className="mark-checkbox"
              checked={view.marked}
              onChange={() => void dispatch({ type: "mark" })}
              disabled={submitting}
            />{" "}
            Mark Image (X)
          </label>
        </div>

        <div className="nav-controls">
          <button
            className="nav-btn"
            onClick={() => void dispatch({ type: "prev" })}
            disabled={submitting || view.at_start}
          >
            &larr; Previous
          </button>
          <button
            className="nav-btn undo-btn"
            onClick={() => void dispatch({ type: "undo" })}
            disabled={submitting || !view.can_undo}
          >
            Undo (U)
          </button>
          <button
            className="nav-btn"
            onClick={() => void dispatch({ type: "next" })}
            disabled={submitting || view.at_end}
          >
            Next &rarr;
          </button>
        </div>

        <div className="help-text">
          Keyboard shortcuts: <span className="kbd">1-{Math.min(view.num_classes, 9)}</span> rate &amp; next |{" "}
          <span className="kbd">←→</span> navigate | <span className="kbd">U</span> undo |{" "}
          <span className="kbd">X</span> mark/unmark
        </div>

        <AnnotatorField value={username} onChange={handleUsernameChange} disabled={submitting} />
      </div>
    </div>
  );
}

import type { SessionView } from "../../types";

interface ProgressHeaderProps {
  view: SessionView;
  onToggleFilter: () => void;
  disabled: boolean;
}

export default function ProgressHeader({ view, onToggleFilter, disabled }: ProgressHeaderProps) {
  const { stats } = view;

  return (
    <div>
      <div className="progress">
        Image {view.index + 1} of {stats.total} | Annotated: {stats.annotated}/
        {stats.total} ({stats.percentage}%) | Marked: {stats.marked} |{" "}
        <span className="folder-name">{view.images_folder}</span>
      </div>
      <div
        className="progress-bar"
        role="progressbar"
        aria-valuenow={stats.percentage}
        aria-valuemin={0}
        aria-valuemax={100}
      >
        <div className="progress-fill" style={{ width: `${stats.percentage}%` }} />
      </div>
      <div className="filter-container">
        <label className="filter-label">
          <input
            type="checkbox"
            className="filter-checkbox"
            checked={view.filter_unannotated}
            onChange={onToggleFilter}
            disabled={disabled}
          />{" "}
          Show unannotated only
        </label>
      </div>
    </div>
  );
}

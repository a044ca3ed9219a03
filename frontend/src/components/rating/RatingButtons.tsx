interface RatingButtonsProps {
  numClasses: number;
  current: number;
  onRate: (rating: number) => void;
  disabled?: boolean;
}

/**
 * RatingButtons - One button per class, 1..numClasses.
 *
 * The button matching the current rating is highlighted. Clicking a button
 * does the same as pressing its digit key.
 */
export default function RatingButtons({
  numClasses,
  current,
  onRate,
  disabled = false,
}: RatingButtonsProps) {
  const ratings = Array.from({ length: numClasses }, (_, i) => i + 1);

  return (
    <div className="rating-buttons" role="group" aria-label="Rating">
      {ratings.map((rating) => (
        <button
          key={rating}
          type="button"
          onClick={() => onRate(rating)}
          disabled={disabled}
          aria-pressed={current === rating}
          className={`rating-btn ${current === rating ? "active" : ""}`}
        >
          {rating}
        </button>
      ))}
    </div>
  );
}

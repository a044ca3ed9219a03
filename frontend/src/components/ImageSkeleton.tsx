/**
 * ImageSkeleton component for loading states.
 *
 * Shows an animated placeholder the size of the image area while the first
 * session view is fetched.
 */
export default function ImageSkeleton() {
  return (
    <div className="image-container" aria-busy="true">
      <div className="skeleton">
        <div className="skeleton-content" />
      </div>
    </div>
  );
}

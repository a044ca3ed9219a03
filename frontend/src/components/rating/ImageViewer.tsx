// Fallback image for broken/missing images
const FALLBACK_IMAGE_SRC =
  "data:image/svg+xml;base64,PHN2ZyB3aWR0aD0iMTUwIiBoZWlnaHQ9IjE1MCIgeG1sbnM9Imh0dHA6Ly93d3cudzMub3JnLzIwMDAvc3ZnIj48cmVjdCB3aWR0aD0iMTUwIiBoZWlnaHQ9IjE1MCIgZmlsbD0iI2NjYyIvPjx0ZXh0IHg9IjUwJSIgeT0iNTAlIiBkb21pbmFudC1iYXNlbGluZT0ibWlkZGxlIiB0ZXh0LWFuY2hvcj0ibWlkZGxlIj5ObyBJbWFnZTwvdGV4dD48L3N2Zz4=";

interface ImageViewerProps {
  src: string;
  identifier: string;
  marked: boolean;
}

/**
 * ImageViewer - the image under review.
 *
 * Keyed on the identifier by the parent so a new image never briefly shows
 * the previous one's fallback.
 */
export default function ImageViewer({ src, identifier, marked }: ImageViewerProps) {
  return (
    <div className={`image-container ${marked ? "image-container--marked" : ""}`}>
      <img
        src={src}
        alt={identifier}
        onError={(e) => {
          e.currentTarget.src = FALLBACK_IMAGE_SRC;
        }}
      />
      {marked && <div className="image-marked-label">Marked</div>}
    </div>
  );
}

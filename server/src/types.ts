export interface AnnotationRecord {
  image_identifier: string;
  /** 0 means unrated. */
  rating: number;
  marked: boolean;
  username: string;
  /** ISO-8601 */
  timestamp: string;
}

export interface ProgressStats {
  total: number;
  annotated: number;
  marked: number;
  remaining: number;
  percentage: number;
}

export interface Summary {
  total_records: number;
  unrated: number;
  marked: number;
  rating_distribution: Record<string, number>;
  annotators: string[];
}

export interface ExportDocument {
  metadata: {
    num_images: number;
    images_folder: string;
    rating_distribution: Record<string, number>;
    annotators: string[];
    marked_count: number;
    exported_at: string;
  };
  records: AnnotationRecord[];
}

/** What the front end renders after every request. */
export interface SessionView {
  title: string;
  description: string;
  num_classes: number;
  images_folder: string;
  index: number;
  total: number;
  image_identifier: string;
  image_url: string;
  rating: number;
  marked: boolean;
  stats: ProgressStats;
  can_undo: boolean;
  history_size: number;
  filter_unannotated: boolean;
  at_start: boolean;
  at_end: boolean;
}

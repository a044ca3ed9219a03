import type { AnnotationRecord, ExportDocument, ProgressStats, Summary } from "./types";

export function progressStats(
  images: readonly string[],
  records: readonly AnnotationRecord[],
): ProgressStats {
  const catalog = new Set(images);
  let annotated = 0;
  let marked = 0;
  for (const record of records) {
    if (!catalog.has(record.image_identifier)) continue;
    if (record.rating > 0) annotated += 1;
    if (record.marked) marked += 1;
  }

  const total = images.length;
  return {
    total,
    annotated,
    marked,
    remaining: total - annotated,
    percentage: total > 0 ? Math.round((100 * annotated) / total) : 0,
  };
}

function ratingDistribution(records: readonly AnnotationRecord[]): Record<string, number> {
  const distribution: Record<string, number> = {};
  for (const { rating } of records) {
    if (rating > 0) {
      distribution[rating] = (distribution[rating] ?? 0) + 1;
    }
  }
  return distribution;
}

function annotators(records: readonly AnnotationRecord[]): string[] {
  return [...new Set(records.map((record) => record.username))].sort();
}

export function summarize(records: readonly AnnotationRecord[]): Summary {
  return {
    total_records: records.length,
    unrated: records.filter((record) => record.rating === 0).length,
    marked: records.filter((record) => record.marked).length,
    rating_distribution: ratingDistribution(records),
    annotators: annotators(records),
  };
}

export function buildExport(
  imagesFolder: string,
  records: readonly AnnotationRecord[],
  exportedAt: string,
): ExportDocument {
  const sorted = [...records].sort((a, b) =>
    a.image_identifier < b.image_identifier ? -1 : a.image_identifier > b.image_identifier ? 1 : 0,
  );
  return {
    metadata: {
      num_images: sorted.length,
      images_folder: imagesFolder,
      rating_distribution: ratingDistribution(sorted),
      annotators: annotators(sorted),
      marked_count: sorted.filter((record) => record.marked).length,
      exported_at: exportedAt,
    },
    records: sorted,
  };
}

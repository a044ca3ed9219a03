import type { AnnotationStore } from "./datastore";
import { InvalidRating, NothingToUndo } from "./errors";
import { UndoHistory } from "./history";
import type { AnnotationRecord } from "./types";

export type ActionKind = "rate" | "mark";

/** State of one image before and after a mutating action. */
export interface ActionSnapshot {
  imageIdentifier: string;
  /** Undefined when the image had no record yet. */
  previous?: AnnotationRecord;
  written: AnnotationRecord;
}

export interface NavigationOptions {
  images: readonly string[];
  store: AnnotationStore;
  numClasses: number;
  maxHistory: number;
}

function isUnannotated(record: AnnotationRecord | undefined): boolean {
  return record === undefined || record.rating === 0;
}

/**
 * Navigation and undo state of the one running annotation session. Request
 * handlers receive it through the app context; nothing here is global.
 */
export class NavigationController {
  readonly images: readonly string[];
  readonly numClasses: number;
  private readonly store: AnnotationStore;
  private readonly history: UndoHistory<ActionSnapshot>;
  private readonly positions: Map<string, number>;
  private index = 0;
  private filterUnannotated = false;

  constructor({ images, store, numClasses, maxHistory }: NavigationOptions) {
    if (images.length === 0) {
      throw new RangeError("NavigationController needs at least one image");
    }
    this.images = images;
    this.store = store;
    this.numClasses = numClasses;
    this.history = new UndoHistory<ActionSnapshot>(maxHistory);
    this.positions = new Map(images.map((image, i) => [image, i]));
  }

  get currentIndex(): number {
    return this.index;
  }

  get historySize(): number {
    return this.history.size;
  }

  get isFiltering(): boolean {
    return this.filterUnannotated;
  }

  current(): string {
    return this.images[this.index];
  }

  next(): number {
    return this.move(1);
  }

  prev(): number {
    return this.move(-1);
  }

  /** Resume position: first image without a rating, or the last image. */
  jumpToFirstUnannotated(): number {
    const first = this.firstUnannotated();
    this.index = first === -1 ? this.images.length - 1 : first;
    return this.index;
  }

  /** Switching the filter on moves to the first unannotated image, if any. */
  toggleFilter(): boolean {
    this.filterUnannotated = !this.filterUnannotated;
    if (this.filterUnannotated) {
      const first = this.firstUnannotated();
      if (first !== -1) {
        this.index = first;
      }
    }
    return this.filterUnannotated;
  }

  rate(rating: number, username: string, timestamp: string): AnnotationRecord {
    if (!Number.isInteger(rating) || rating < 1 || rating > this.numClasses) {
      throw new InvalidRating(rating, this.numClasses);
    }
    const image = this.current();
    const previous = this.store.get(image);
    return this.recordAction("rate", {
      image_identifier: image,
      rating,
      marked: previous?.marked ?? false,
      username,
      timestamp,
    }, previous);
  }

  toggleMark(username: string, timestamp: string): AnnotationRecord {
    const image = this.current();
    const previous = this.store.get(image);
    return this.recordAction("mark", {
      image_identifier: image,
      rating: previous?.rating ?? 0,
      marked: !(previous?.marked ?? false),
      username,
      timestamp,
    }, previous);
  }

  /**
   * Writes `record` and remembers what it replaced. The snapshot is only
   * pushed once the write succeeded, so a storage failure leaves both the
   * history and the position untouched.
   */
  recordAction(
    kind: ActionKind,
    record: AnnotationRecord,
    previous: AnnotationRecord | undefined = this.store.get(record.image_identifier),
  ): AnnotationRecord {
    this.store.upsert(record);
    this.history.push({ imageIdentifier: record.image_identifier, previous, written: record });
    if (kind === "rate") {
      this.next();
    }
    return record;
  }

  /** Reverts the most recent action and returns to its image. */
  undo(): ActionSnapshot {
    const snapshot = this.history.peek();
    if (!snapshot) {
      throw new NothingToUndo();
    }

    this.store.upsert(
      snapshot.previous ?? {
        ...snapshot.written,
        rating: 0,
        marked: false,
      },
    );
    this.history.pop();

    const position = this.positions.get(snapshot.imageIdentifier);
    if (position !== undefined) {
      this.index = position;
    }
    return snapshot;
  }

  private firstUnannotated(): number {
    return this.images.findIndex((image) => isUnannotated(this.store.get(image)));
  }

  private move(direction: 1 | -1): number {
    if (!this.filterUnannotated) {
      const target = this.index + direction;
      if (target >= 0 && target < this.images.length) {
        this.index = target;
      }
      return this.index;
    }

    for (let i = this.index + direction; i >= 0 && i < this.images.length; i += direction) {
      if (isUnannotated(this.store.get(this.images[i]))) {
        this.index = i;
        break;
      }
    }
    return this.index;
  }
}

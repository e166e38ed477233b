import { hasDigest } from "../image/reference.js";
import type {
  GitReference,
  HttpReference,
  ImageReference,
  ManifestReferences,
  Task,
  TaskSet,
} from "../types/references.js";

/**
 * Collects unique references from one or more manifests.
 *
 * A literal seen before (in any manifest) is dropped; the first occurrence
 * keeps its global order index so aggregation can restore manifest order.
 * Images that already carry a digest are pinned and never become tasks.
 */
export class TaskCollector {
  private readonly images: Task<ImageReference>[] = [];
  private readonly http: Task<HttpReference>[] = [];
  private readonly git: Task<GitReference>[] = [];
  private readonly seenImages = new Set<string>();
  private readonly seenHttp = new Set<string>();
  private readonly seenGit = new Set<string>();
  private orderIndex = 0;

  collect(manifest: ManifestReferences): void {
    for (const ref of manifest.images) {
      if (this.seenImages.has(ref.original)) continue;
      this.seenImages.add(ref.original);
      if (hasDigest(ref.original)) continue;
      this.images.push(this.task(ref));
    }

    for (const ref of manifest.http) {
      if (this.seenHttp.has(ref.original)) continue;
      this.seenHttp.add(ref.original);
      this.http.push(this.task(ref));
    }

    for (const ref of manifest.git) {
      if (this.seenGit.has(ref.original)) continue;
      this.seenGit.add(ref.original);
      this.git.push(this.task(ref));
    }
  }

  private task<R extends ImageReference | HttpReference | GitReference>(reference: R): Task<R> {
    return { reference, orderIndex: this.orderIndex++, key: reference.original };
  }

  isEmpty(): boolean {
    return this.images.length === 0 && this.http.length === 0 && this.git.length === 0;
  }

  size(): number {
    return this.images.length + this.http.length + this.git.length;
  }

  tasks(): TaskSet {
    return { images: [...this.images], http: [...this.http], git: [...this.git] };
  }
}

/**
 * Image Tracker
 * Unified tracking for stats and issues
 */

import { writeFile, mkdir } from "fs/promises";
import { dirname } from "path";
import type { ImageFailureReason, ImageResult } from "../types";

// ============================================================================
// Types
// ============================================================================

export interface ImageIssue {
  title: string;
  sourceUrl: string;
  reason: ImageFailureReason;
  details: string;
}

export interface ImageStats {
  totalImages: number;
  downloadedImages: number;
  cachedImages: number;
  healedImages: number;
  failedImages: number;

  issues: ImageIssue[];

  // Timing
  duration: number;
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private downloadedImages = 0;
  private cachedImages = 0;
  private healedImages = 0;
  private failedImages = 0;
  private issues: ImageIssue[] = [];
  private startTime = new Date();

  /**
   * Record the outcome of one image request
   */
  track(title: string, sourceUrl: string, result: ImageResult): void {
    switch (result.status) {
      case "cached":
        this.cachedImages++;
        break;
      case "downloaded":
        this.downloadedImages++;
        if (result.healed) this.healedImages++;
        break;
      case "failed":
        this.failedImages++;
        this.issues.push({
          title,
          sourceUrl,
          reason: result.reason,
          details: result.details,
        });
        break;
    }
  }

  getIssues(reason?: ImageFailureReason): ImageIssue[] {
    if (!reason) return this.issues;
    return this.issues.filter((i) => i.reason === reason);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ImageStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      totalImages:
        this.downloadedImages + this.cachedImages + this.failedImages,
      downloadedImages: this.downloadedImages,
      cachedImages: this.cachedImages,
      healedImages: this.healedImages,
      failedImages: this.failedImages,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputPath: string): Promise<void> {
    const { issues, ...summary } = this.getStats();

    const exported = {
      summary,
      issues: this.groupIssuesByReason(issues),
    };

    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByReason(
    issues: ImageIssue[],
  ): Partial<Record<ImageFailureReason, ImageIssue[]>> {
    const grouped: Partial<Record<ImageFailureReason, ImageIssue[]>> = {};

    for (const issue of issues) {
      const bucket = grouped[issue.reason] ?? [];
      bucket.push(issue);
      grouped[issue.reason] = bucket;
    }

    return grouped;
  }
}

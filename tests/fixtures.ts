import type { RawVideoRecord } from "../src/shared/record.js";

export const FIXED_NOW = new Date("2024-06-01T12:00:00Z");

// Three title themes, two videos each; the survival videos engage best.
export const themedRecords = (): RawVideoRecord[] => [
  {
    id: "mc-1",
    title: "Minecraft survival build",
    description: "Building a base",
    categoryId: "20",
    publishedAt: "2024-05-30T18:00:00Z",
    viewCount: "1000",
    likeCount: "300",
    commentCount: "50"
  },
  {
    id: "mc-2",
    title: "Minecraft survival hardcore",
    description: "One life only",
    categoryId: "20",
    publishedAt: "2024-05-29T18:30:00.000Z",
    viewCount: "3000",
    likeCount: "900",
    commentCount: "120"
  },
  {
    id: "pa-1",
    title: "Pasta recipe easy",
    description: "Weeknight cooking",
    categoryId: "26",
    publishedAt: "2024-05-28T09:00:00Z",
    viewCount: "500",
    likeCount: "10",
    commentCount: "2"
  },
  {
    id: "pa-2",
    title: "Pasta recipe dinner",
    description: "Survival cooking for students",
    categoryId: "26",
    publishedAt: "2024-05-27T09:45:00Z",
    viewCount: "700",
    likeCount: "14",
    commentCount: "3"
  },
  {
    id: "fb-1",
    title: "Football highlights goals",
    description: "Weekend recap",
    categoryId: "17",
    publishedAt: "2024-05-31T22:00:00Z",
    viewCount: "8000",
    likeCount: "80",
    commentCount: "40"
  },
  {
    id: "fb-2",
    title: "Football highlights league",
    description: "Season review",
    categoryId: "17",
    publishedAt: "not-a-timestamp",
    viewCount: "6000",
    likeCount: "60",
    commentCount: "30"
  }
];

// Catalog API shape, as a snapshot file stores it.
export const catalogItem = (id: string, title: string, categoryId: string, viewCount: string) => ({
  kind: "video",
  id,
  snippet: { title, description: `${title} description`, categoryId, publishedAt: "2024-05-30T10:00:00Z" },
  statistics: { viewCount, likeCount: "5", commentCount: "1" }
});

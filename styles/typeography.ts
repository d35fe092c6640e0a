export const text = {
  pageTitle: "text-3xl font-semibold tracking-tight text-primary",
  sectionTitle:
    "text-sm font-semibold uppercase tracking-wide text-muted-foreground",
  body: "text-sm text-foreground",
  meta: "text-xs text-muted-foreground",
} as const;

export const surface = {
  page: "min-h-dvh overflow-x-hidden bg-background text-foreground",
  cardPadded:
    "rounded-2xl border-2 border-border bg-card p-4 text-card-foreground shadow-sm",
} as const;

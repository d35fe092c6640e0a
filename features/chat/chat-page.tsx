import * as React from "react";
import { AlertTriangle, Info, Music2, Sparkles } from "lucide-react";

import { cn } from "@/lib/utils";
import { useMusicAgent } from "@/hooks/useMusicAgent";
import { AppLayout } from "@components/layout/app-layout";
import { EqualizerSpinner } from "@components/equalizer-spinner";
import { Button } from "@components/ui/button";
import { Input } from "@components/ui/input";
import { surface, text } from "@styles/typeography";
import buildChatViewModel, {
  NO_LYRICS_MESSAGE,
  audioSrc,
  lyricsPreview,
} from "./viewModel";

const PLACEHOLDER = "e.g. Play Bohemian Rhapsody or Who is Freddie Mercury";

export function ChatPage() {
  const [query, setQuery] = React.useState("");
  const [selectedIndex, setSelectedIndex] = React.useState(0);
  const { state, status, error, ask } = useMusicAgent();

  const vm = React.useMemo(
    () => (state ? buildChatViewModel(state) : null),
    [state],
  );

  // A fresh result always starts on its first track.
  React.useEffect(() => {
    setSelectedIndex(0);
  }, [state]);

  async function handleSubmit(e: React.FormEvent) {
    e.preventDefault();
    await ask(query);
  }

  const selected = vm?.tracks[selectedIndex] ?? null;
  const lyrics = selected ? lyricsPreview(selected.track.lyrics) : null;

  return (
    <AppLayout>
      <div className="space-y-6">
        <div className="space-y-1">
          <h1 className={text.pageTitle}>Music Chatbot</h1>
          <p className={text.meta}>Ask me about music or request a song.</p>
        </div>

        <form onSubmit={handleSubmit} className="flex gap-2">
          <Input
            value={query}
            onChange={(e) => setQuery(e.target.value)}
            placeholder={PLACEHOLDER}
            aria-label="Ask me about music or request a song"
          />
          <Button type="submit" disabled={status === "loading" || !query.trim()}>
            Ask
          </Button>
        </form>

        {status === "loading" ? <EqualizerSpinner label="Thinking..." /> : null}

        {status === "error" && error ? (
          <div
            role="alert"
            className={cn(
              surface.cardPadded,
              "flex items-start gap-2 border-destructive text-destructive",
            )}
          >
            <AlertTriangle className="mt-0.5 h-4 w-4 shrink-0" />
            <span className={text.body}>{error}</span>
          </div>
        ) : null}

        {vm?.trivia ? (
          <section className="space-y-2">
            <h2 className={text.sectionTitle}>Music Trivia</h2>
            <div className={cn(surface.cardPadded, "flex items-start gap-2 border-primary/40")}>
              <Sparkles className="mt-0.5 h-4 w-4 shrink-0 text-primary" />
              <p className={text.body}>{vm.trivia}</p>
            </div>
          </section>
        ) : null}

        {vm && vm.emptyMessage ? (
          <div className={cn(surface.cardPadded, "flex items-center gap-2")}>
            <Info className="h-4 w-4 shrink-0 text-muted-foreground" />
            <span className={text.body}>{vm.emptyMessage}</span>
          </div>
        ) : null}

        {vm && selected ? (
          <section className="space-y-3">
            <h2 className={text.sectionTitle}>Found Tracks</h2>
            <label className="block space-y-1">
              <span className={text.meta}>Select a track to play:</span>
              <select
                className="h-11 w-full rounded-xl border-2 border-border bg-background px-3 text-sm"
                value={selectedIndex}
                onChange={(e) => setSelectedIndex(Number(e.target.value))}
              >
                {vm.tracks.map((item) => (
                  <option key={item.index} value={item.index}>
                    {item.label}
                  </option>
                ))}
              </select>
            </label>

            <div className={cn(surface.cardPadded, "space-y-3")}>
              <p className={cn(text.body, "flex items-center gap-2")}>
                <Music2 className="h-4 w-4 text-primary" />
                <span>
                  <strong>Now Playing:</strong>{" "}
                  <code>{selected.track.title}</code> by{" "}
                  <code>{selected.track.artist}</code>
                </span>
              </p>
              <audio
                key={selected.track.filePath}
                controls
                className="w-full"
                src={audioSrc(selected.track)}
              />
            </div>

            <div className="space-y-2">
              <h3 className={text.sectionTitle}>Lyrics</h3>
              {lyrics ? (
                <pre className={cn(surface.cardPadded, "whitespace-pre-wrap font-sans text-sm")}>
                  {lyrics}
                </pre>
              ) : (
                <p className={text.meta}>{NO_LYRICS_MESSAGE}</p>
              )}
            </div>
          </section>
        ) : null}
      </div>
    </AppLayout>
  );
}

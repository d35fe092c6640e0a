import { cn } from "@/lib/utils";

const BAR_DELAYS_MS = [0, 180, 360, 90];

export function EqualizerSpinner({
  size = 28,
  className,
  label,
}: {
  size?: number;
  className?: string;
  label?: string;
}) {
  const px = `${size}px`;

  return (
    <div
      className={cn("inline-flex items-center gap-2", className)}
      aria-label="Loading"
      role="status"
    >
      <style jsx global>{`
        @keyframes tunechat-eq {
          0%,
          100% {
            transform: scaleY(0.25);
          }
          50% {
            transform: scaleY(1);
          }
        }
      `}</style>

      <div
        className="flex items-end justify-between"
        style={{ width: px, height: px }}
      >
        {BAR_DELAYS_MS.map((delay) => (
          <span
            key={delay}
            className="h-full w-[18%] origin-bottom rounded-sm bg-primary"
            style={{
              animation: "tunechat-eq 0.9s ease-in-out infinite",
              animationDelay: `${delay}ms`,
            }}
          />
        ))}
      </div>

      {label ? <span className="text-xs text-muted-foreground">{label}</span> : null}
    </div>
  );
}

"use client";

export default function Error({ reset }: { error: Error & { digest?: string }; reset: () => void }) {
  return (
    <div className="flex min-h-[60vh] flex-col items-center justify-center px-4 text-center">
      <h2 className="text-xl font-bold text-gray-900">Something went wrong</h2>
      <p className="mt-2 text-sm text-gray-600">The page could not be loaded. Please try again.</p>
      <button
        onClick={reset}
        className="mt-6 rounded-lg bg-[rgb(var(--brand-primary))] px-5 py-2.5 text-sm font-medium text-white transition hover:opacity-95"
      >
        Try again
      </button>
    </div>
  );
}

import Link from "next/link";

export default function NotFound() {
  return (
    <div className="flex min-h-[60vh] flex-col items-center justify-center px-4 text-center">
      <h2 className="text-xl font-bold text-gray-900">Page not found</h2>
      <p className="mt-2 text-sm text-gray-600">The page you asked for does not exist.</p>
      <Link
        href="/"
        className="mt-6 rounded-lg bg-[rgb(var(--brand-primary))] px-5 py-2.5 text-sm font-medium text-white transition hover:opacity-95"
      >
        Back to dashboards
      </Link>
    </div>
  );
}

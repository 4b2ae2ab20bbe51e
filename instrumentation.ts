export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;

  const { bootstrap } = await import("./lib/bootstrap");
  const { logger } = await import("./lib/logger");
  try {
    await bootstrap();
  } catch (e: unknown) {
    // The API still serves; /admin/load_csv can fill the store later
    logger.error("Startup failed", { error: e instanceof Error ? e.message : String(e) });
  }
}

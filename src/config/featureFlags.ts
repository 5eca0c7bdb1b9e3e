// src/config/featureFlags.ts

export function isHintRagEnabled(): boolean {
  const raw = String(process.env.HINT_RAG_ENABLED ?? "").toLowerCase().trim();
  if (!raw) return true;
  return !(raw === "0" || raw === "false" || raw === "off");
}

import { ComparisonWorkspace } from "@/components/comparison/ComparisonWorkspace";
import { getConfig } from "@/lib/config";

export const dynamic = "force-dynamic";

export default function HomePage() {
  return (
    <main className="min-h-screen bg-[var(--color-bg-secondary)]">
      <ComparisonWorkspace defaultThreshold={getConfig().matchThreshold} />
    </main>
  );
}

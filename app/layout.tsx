import "./globals.css";
import TopNav from "@/components/TopNav";
import PageContainer, { LANE } from "@/components/PageContainer";
import ToastHost from "@/components/ui/ToastHost";

export const metadata = {
  title: "Blind Rating Desk",
  description: "Rate assigned reports without knowing which variant you were shown.",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  const appVersion = String(process.env.NEXT_PUBLIC_APP_VERSION || "0.1.0").trim();

  return (
    <html lang="en">
      <body className="min-h-screen bg-zinc-50 text-zinc-900 flex flex-col">
        <TopNav />
        <ToastHost />

        <main className="flex-1">
          <PageContainer>{children}</PageContainer>
        </main>

        <footer className="border-t border-zinc-200/40 bg-zinc-50">
          <div className={LANE + " py-1.5"}>
            <div className="text-center text-[11px] leading-4 text-zinc-400">Blind Rating Desk · v{appVersion}</div>
          </div>
        </footer>
      </body>
    </html>
  );
}

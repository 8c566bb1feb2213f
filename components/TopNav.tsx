"use client";

import Link from "next/link";
import { usePathname } from "next/navigation";
import { LANE } from "@/components/PageContainer";

type NavItem = { label: string; href: string };

const MAIN_ITEMS: NavItem[] = [
  { label: "Progress", href: "/progress" },
  { label: "Rate", href: "/rate" },
  { label: "Admin", href: "/admin" },
];

function isActive(pathname: string, href: string) {
  return pathname === href || pathname.startsWith(href + "/");
}

export default function TopNav() {
  const pathname = usePathname();
  if (pathname === "/") return null;

  return (
    <header className="sticky top-0 z-50 border-b border-zinc-200 bg-white/90 backdrop-blur">
      <div className={LANE + " flex items-center justify-between gap-3 py-2.5"}>
        <Link href="/progress" className="flex items-center gap-2">
          <span className="inline-flex h-8 w-8 items-center justify-center rounded-xl border border-sky-200 bg-sky-50 text-sm font-bold text-sky-900">
            BR
          </span>
          <span className="text-base font-semibold tracking-tight">Blind Rating Desk</span>
        </Link>

        <nav className="flex items-center justify-end gap-3 sm:gap-5">
          {MAIN_ITEMS.map((it) => {
            const active = isActive(pathname, it.href);
            return (
              <Link
                key={it.href}
                href={it.href}
                aria-current={active ? "page" : undefined}
                className={
                  "inline-flex h-9 items-center justify-center border-b-2 px-0 text-sm font-semibold transition " +
                  (active
                    ? "border-zinc-900 text-zinc-900"
                    : "border-transparent text-zinc-600 hover:border-zinc-300 hover:text-zinc-900")
                }
              >
                {it.label}
              </Link>
            );
          })}
        </nav>
      </div>
    </header>
  );
}

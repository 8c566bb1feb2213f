// components/ui/uiClasses.ts
export const ui = {
  btnPrimary:
    "inline-flex items-center justify-center rounded-xl bg-zinc-900 px-4 py-2 text-sm font-semibold text-white shadow-sm hover:bg-zinc-800 disabled:opacity-50",

  btnSecondary:
    "inline-flex items-center justify-center rounded-xl border border-zinc-300 bg-white px-4 py-2 text-sm font-semibold text-zinc-900 shadow-sm hover:bg-zinc-50",

  card: "rounded-2xl border border-zinc-200 bg-white p-5 shadow-sm",

  input:
    "w-full rounded-xl border border-zinc-300 bg-white px-3 py-2 text-sm focus:outline-none focus:ring-2 focus:ring-zinc-300",

  row: "w-full rounded-xl border p-3 text-left transition",

  rowActive: "border-zinc-300 bg-zinc-50 text-zinc-900 ring-1 ring-zinc-200",

  rowInactive: "border-zinc-200 bg-white hover:bg-zinc-50",
};

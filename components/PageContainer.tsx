// components/PageContainer.tsx
import React from "react";

export const LANE = "mx-auto w-full max-w-5xl px-4";

export default function PageContainer({
  children,
  className = "",
}: {
  children: React.ReactNode;
  className?: string;
}) {
  return <div className={LANE + " pt-4 pb-6" + (className ? ` ${className}` : "")}>{children}</div>;
}

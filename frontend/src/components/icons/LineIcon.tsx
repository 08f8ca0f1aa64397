import React from 'react';

export type LineIconName = 'power' | 'clock' | 'meter' | 'chart' | 'home' | 'plus';

interface Props {
  name: LineIconName;
  size?: number;
  strokeWidth?: number;
}

const paths: Record<LineIconName, JSX.Element> = {
  power: (
    <>
      <polyline points="12 2 12 12 7 17" />
      <polyline points="12 12 17 7" />
      <circle cx="12" cy="12" r="9.5" />
    </>
  ),
  clock: (
    <>
      <circle cx="12" cy="12" r="9.5" />
      <polyline points="12 6.5 12 12 16 14" />
    </>
  ),
  meter: (
    <>
      <rect x="4" y="3" width="16" height="18" rx="3" ry="3" />
      <rect x="7" y="6" width="10" height="5" rx="1" />
      <path d="M8 15h2M14 15h2M8 18h8" />
    </>
  ),
  chart: (
    <>
      <path d="M4 20h16" />
      <rect x="6" y="12" width="3" height="6" />
      <rect x="11" y="8" width="3" height="10" />
      <rect x="16" y="4" width="3" height="14" />
    </>
  ),
  home: (
    <>
      <path d="M3 11.5 12 4l9 7.5" />
      <path d="M6 10v10h12V10" />
    </>
  ),
  plus: (
    <>
      <circle cx="12" cy="12" r="9.5" />
      <path d="M12 8v8M8 12h8" />
    </>
  ),
};

const LineIcon: React.FC<Props> = ({ name, size = 20, strokeWidth = 1.5 }) => {
  return (
    <svg
      width={size}
      height={size}
      viewBox="0 0 24 24"
      fill="none"
      stroke="currentColor"
      strokeWidth={strokeWidth}
      strokeLinecap="round"
      strokeLinejoin="round"
      aria-hidden
    >
      {paths[name]}
    </svg>
  );
};

export default LineIcon;

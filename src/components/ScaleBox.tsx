import React, { useRef } from 'react';
import { getDashboardConfig } from '../config';
import { useViewportScale } from '../hooks/useViewportScale';

/** Fixed design-size canvas, centered and scaled by `--scale` to fit the window. */
export const ScaleBox: React.FC<{ children: React.ReactNode }> = ({ children }) => {
  const ref = useRef<HTMLDivElement>(null);
  const { design } = getDashboardConfig();
  useViewportScale(ref);

  return (
    <div
      ref={ref}
      id="scaleBox"
      className="fixed left-1/2 top-1/2 origin-center"
      style={{
        width: design.width,
        height: design.height,
        transform: 'translate(-50%, -50%) scale(var(--scale, 1))',
      }}
    >
      {children}
    </div>
  );
};

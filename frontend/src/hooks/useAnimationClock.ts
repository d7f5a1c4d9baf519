/**
 * Drives the reveal animation from requestAnimationFrame.
 * While active, each frame reports the milliseconds since the previous one.
 */

import { useEffect, useRef } from 'react';

// A backgrounded tab can resume with a huge delta; cap it to one step
const MAX_FRAME_DELTA_MS = 250;

export function clampFrameDelta(deltaMs: number): number {
    if (!Number.isFinite(deltaMs) || deltaMs <= 0) return 0;
    return Math.min(deltaMs, MAX_FRAME_DELTA_MS);
}

export function useAnimationClock(active: boolean, onTick: (elapsedMs: number) => void) {
    // Keep the latest callback without restarting the loop
    const onTickRef = useRef(onTick);

    useEffect(() => {
        onTickRef.current = onTick;
    }, [onTick]);

    useEffect(() => {
        if (!active) return;

        let animationFrameId: number;
        let last: number | null = null;

        const loop = (now: number) => {
            if (last !== null) {
                const elapsed = clampFrameDelta(now - last);
                if (elapsed > 0) onTickRef.current(elapsed);
            }
            last = now;
            animationFrameId = requestAnimationFrame(loop);
        };

        animationFrameId = requestAnimationFrame(loop);
        return () => cancelAnimationFrame(animationFrameId);
    }, [active]);
}

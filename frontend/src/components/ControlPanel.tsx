/**
 * Playback controls for the studio: generate, play/pause, reset and speed
 */

import type { Dispatch } from 'react';
import type { GeneratorEvent } from '../state/generatorReducer';
import { BranchIcon, Button, PauseIcon, PlayIcon, ResetIcon } from './ui';

const MAX_SPEED = 10;

interface ControlPanelProps {
    playing: boolean;
    progress: number;
    total: number;
    animationSpeed: number;
    notice: string | null;
    dispatch: Dispatch<GeneratorEvent>;
}

export function ControlPanel({ playing, progress, total, animationSpeed, notice, dispatch }: ControlPanelProps) {
    const revealed = Math.min(Math.floor(progress), total);
    const percent = total > 0 ? (revealed / total) * 100 : 0;

    const handlePlayPause = () => dispatch({ type: playing ? 'pause' : 'play' });

    return (
        <div className="glass-panel" style={{
            display: 'flex',
            flexDirection: 'column',
            gap: '10px',
            padding: '12px 20px',
            width: '100%',
            boxSizing: 'border-box',
        }}>
            <div style={{ display: 'flex', alignItems: 'center', justifyContent: 'space-between', gap: '20px', flexWrap: 'wrap' }}>
                <div style={{ display: 'flex', gap: '10px' }}>
                    <Button variant="success" onClick={() => dispatch({ type: 'generate' })}>
                        <BranchIcon /> Generate
                    </Button>
                    <Button variant="secondary" onClick={handlePlayPause} disabled={total === 0}>
                        {playing ? <><PauseIcon /> Pause</> : <><PlayIcon /> Play</>}
                    </Button>
                    <Button variant="danger" onClick={() => dispatch({ type: 'reset' })}>
                        <ResetIcon /> Reset
                    </Button>
                </div>

                <label style={{ display: 'flex', alignItems: 'center', gap: '10px', fontSize: '13px', color: 'var(--color-text-dim)' }}>
                    Speed
                    <input
                        type="range"
                        min={0}
                        max={MAX_SPEED}
                        step={0.25}
                        value={animationSpeed}
                        onChange={(e) => dispatch({ type: 'setAnimationSpeed', value: e.target.value })}
                    />
                    <span style={{ fontFamily: 'var(--font-mono)', minWidth: '44px', color: 'var(--color-text)' }}>
                        {animationSpeed.toFixed(2)}×
                    </span>
                </label>
            </div>

            <div style={{ display: 'flex', alignItems: 'center', gap: '12px' }}>
                <div style={{ flex: 1, height: '6px', borderRadius: '3px', background: 'var(--color-surface-raised)', overflow: 'hidden' }}>
                    <div style={{ width: `${percent}%`, height: '100%', background: 'var(--color-primary)' }} />
                </div>
                <span style={{ fontFamily: 'var(--font-mono)', fontSize: '12px', color: 'var(--color-text-dim)' }}>
                    {revealed.toLocaleString('en-US')} / {total.toLocaleString('en-US')}
                </span>
            </div>

            {notice && (
                <div role="status" style={{
                    display: 'flex',
                    alignItems: 'center',
                    justifyContent: 'space-between',
                    gap: '12px',
                    padding: '8px 12px',
                    borderRadius: '8px',
                    border: '1px solid rgba(245, 158, 11, 0.4)',
                    background: 'rgba(245, 158, 11, 0.1)',
                    color: '#fbbf24',
                    fontSize: '13px',
                }}>
                    <span>{notice}</span>
                    <Button variant="ghost" size="small" onClick={() => dispatch({ type: 'dismissNotice' })}>
                        Dismiss
                    </Button>
                </div>
            )}
        </div>
    );
}

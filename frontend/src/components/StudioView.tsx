/**
 * StudioView - the L-system editor with the animated canvas
 */

import { useCallback, useMemo, useState } from 'react';
import { config } from '../config';
import { useGenerator } from '../hooks/useGenerator';
import { useAnimationClock } from '../hooks/useAnimationClock';
import { useErrorNotification } from '../hooks/useErrorNotification';
import { primitiveCount } from '../lsystem/progress';
import type { RenderStyle } from '../rendering/types';
import { SceneCanvas } from './SceneCanvas';
import { ControlPanel } from './ControlPanel';
import { ExpansionStats } from './ExpansionStats';
import { ErrorNotification } from './ErrorNotification';
import { AxiomInput } from './studio/AxiomInput';
import { RuleEditor } from './studio/RuleEditor';
import { SymbolActionEditor } from './studio/SymbolActionEditor';
import { ParameterPanel } from './studio/ParameterPanel';
import { PresetSelector } from './studio/PresetSelector';
import { Button, ChevronLeftIcon, ChevronRightIcon, CollapsibleSection } from './ui';

export function StudioView() {
    const { state, dispatch } = useGenerator();
    const { errors, addError, clearError } = useErrorNotification();
    const [sidebarOpen, setSidebarOpen] = useState(true);

    const onTick = useCallback((elapsedMs: number) => dispatch({ type: 'tick', elapsedMs }), [dispatch]);
    useAnimationClock(state.playing, onTick);

    const renderStyle: RenderStyle = useMemo(
        () => ({ lineColor: state.colors.line, background: state.colors.background }),
        [state.colors.line, state.colors.background]
    );

    const total = primitiveCount(state.scene);

    return (
        <div className="studio-layout">
            <ErrorNotification errors={errors} onDismiss={clearError} />

            {sidebarOpen && (
                <aside className="studio-sidebar glass-panel">
                    <CollapsibleSection title="Preset">
                        <PresetSelector presetName={state.presetName} dispatch={dispatch} />
                    </CollapsibleSection>
                    <CollapsibleSection title="Axiom">
                        <AxiomInput axiom={state.axiom} dispatch={dispatch} />
                    </CollapsibleSection>
                    <CollapsibleSection title="Rules" badge={state.rules.length}>
                        <RuleEditor rules={state.rules} dispatch={dispatch} />
                    </CollapsibleSection>
                    <CollapsibleSection title="Symbols" badge={state.assignments.length} defaultExpanded={false}>
                        <SymbolActionEditor assignments={state.assignments} dispatch={dispatch} />
                    </CollapsibleSection>
                    <CollapsibleSection title="Parameters">
                        <ParameterPanel
                            params={state.params}
                            iterations={state.iterations}
                            colors={state.colors}
                            dispatch={dispatch}
                        />
                    </CollapsibleSection>
                </aside>
            )}

            <main className="studio-main">
                <div className="canvas-wrapper">
                    <Button
                        variant="secondary"
                        size="small"
                        className="sidebar-toggle"
                        aria-label={sidebarOpen ? 'Hide editor' : 'Show editor'}
                        onClick={() => setSidebarOpen(open => !open)}
                    >
                        {sidebarOpen ? <ChevronLeftIcon /> : <ChevronRightIcon />}
                    </Button>
                    <SceneCanvas
                        viewMode="studio"
                        scene={state.scene}
                        progress={state.progress}
                        generation={state.generation}
                        renderStyle={renderStyle}
                        width={config.canvasWidth}
                        height={config.canvasHeight}
                        onError={addError}
                        className="studio-canvas"
                    />
                </div>

                <ControlPanel
                    playing={state.playing}
                    progress={state.progress}
                    total={total}
                    animationSpeed={state.animationSpeed}
                    notice={state.notice}
                    dispatch={dispatch}
                />

                <ExpansionStats
                    sequence={state.sequence}
                    lengths={state.lengths}
                    predictedLength={state.predictedLength}
                    scene={state.scene}
                    maxSequenceLength={config.maxSequenceLength}
                />
            </main>
        </div>
    );
}

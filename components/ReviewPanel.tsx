import React from 'react';
import { ChevronLeft, ChevronRight, Layers, RefreshCw, Sparkles } from 'lucide-react';
import type { ReviewState } from '../types';
import { currentRadix } from '../core/reviewSession';
import { SubPanel, cx } from './SubPanel';

interface ReviewPanelProps {
  state: ReviewState;
  /** Infer the pattern from the images currently on screen. */
  onActivate: () => void;
  onStep: (step: 1 | -1) => void;
  onPatternsChange: (sources: string[]) => void;
}

const stepButtonClass =
  'p-1 rounded text-neutral-400 hover:text-white hover:bg-neutral-700 disabled:opacity-30 disabled:pointer-events-none';

export const ReviewPanel: React.FC<ReviewPanelProps> = ({ state, onActivate, onStep, onPatternsChange }) => {
  const [drafts, setDrafts] = React.useState<string[]>(() => state.cellPatterns.map((cell) => cell.pattern));

  // Replace local edits whenever a new pattern set arrives.
  React.useEffect(() => {
    setDrafts(state.cellPatterns.map((cell) => cell.pattern));
  }, [state.cellPatterns]);

  const radix = currentRadix(state);
  const canStep = state.radixes.length > 1;
  const isDirty = drafts.some((draft, i) => draft !== state.cellPatterns[i]?.pattern);

  const updateDraft = (index: number, value: string) => {
    setDrafts((prev) => prev.map((draft, i) => (i === index ? value : draft)));
  };

  return (
    <SubPanel
      title="Review"
      icon={<Layers className="w-3 h-3" />}
      bodyClassName="p-3 space-y-3"
      headerRight={
        <button
          type="button"
          className="flex items-center gap-1 text-[10px] uppercase text-teal-400 hover:text-teal-300"
          onClick={(e) => {
            e.stopPropagation();
            onActivate();
          }}
        >
          <Sparkles className="w-3 h-3" />
          Infer
        </button>
      }
    >
      {state.errorMessage && (
        <p role="alert" className="text-xs text-red-400">{state.errorMessage}</p>
      )}

      <div className="flex items-center justify-between">
        <button type="button" aria-label="Previous set" disabled={!canStep} className={stepButtonClass} onClick={() => onStep(-1)}>
          <ChevronLeft className="w-4 h-4" />
        </button>
        <div className="text-center min-w-0">
          <div className="text-sm font-mono text-neutral-200 truncate">{radix ?? 'No matching sets'}</div>
          {radix !== null && (
            <div className="text-[10px] text-neutral-500">{`${state.currentIndex + 1} / ${state.radixes.length}`}</div>
          )}
        </div>
        <button type="button" aria-label="Next set" disabled={!canStep} className={stepButtonClass} onClick={() => onStep(1)}>
          <ChevronRight className="w-4 h-4" />
        </button>
      </div>

      {state.cellPatterns.length > 0 && (
        <div className="space-y-1.5">
          {state.cellPatterns.map((cell, i) => (
            <label key={i} className="flex items-center gap-2">
              <span className="w-20 shrink-0 text-xs text-neutral-400 truncate">{cell.label}</span>
              <input
                type="text"
                value={drafts[i] ?? ''}
                spellCheck={false}
                className={cx(
                  'flex-1 min-w-0 bg-neutral-800 border rounded px-1.5 py-0.5 text-[11px] font-mono text-neutral-200',
                  drafts[i] !== cell.pattern ? 'border-amber-600/60' : 'border-neutral-700'
                )}
                onChange={(e) => updateDraft(i, e.target.value)}
              />
            </label>
          ))}
          <button
            type="button"
            disabled={!isDirty}
            className="flex items-center gap-1 text-xs text-neutral-300 hover:text-white disabled:opacity-30"
            onClick={() => onPatternsChange(drafts)}
          >
            <RefreshCw className="w-3 h-3" />
            Rescan
          </button>
        </div>
      )}
    </SubPanel>
  );
};

/**
 * QuestionPanel Component
 *
 * Text input for a natural-language question plus the state of the last submission.
 */

import React, { useCallback, useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import Spinner from 'ink-spinner';
import { useAppContext } from '../../context/AppContext.js';

export interface QuestionPanelProps {
  onSubmit: (question: string) => Promise<void>;
}

export const QuestionPanel: React.FC<QuestionPanelProps> = ({ onSubmit }) => {
  const { state, dispatch } = useAppContext();
  const panelFocused = state.focusedPanel === 1 && state.modalOpen === null;
  const [inputActive, setInputActive] = useState(false);
  const [value, setValue] = useState('');
  const { submitting, question, inProgress } = state.view;

  useEffect(() => {
    if (!panelFocused && inputActive) {
      setInputActive(false);
    }
  }, [panelFocused, inputActive]);

  // Pause global shortcuts while typing
  useEffect(() => {
    const capturing = state.inputCapture === 'question';
    if (panelFocused && inputActive && !capturing) {
      dispatch({ type: 'SET_INPUT_CAPTURE', capture: 'question' });
    } else if ((!panelFocused || !inputActive) && capturing) {
      dispatch({ type: 'SET_INPUT_CAPTURE', capture: null });
    }
  }, [dispatch, inputActive, panelFocused, state.inputCapture]);

  useInput((_, key) => {
    if (!inputActive && key.return) {
      setInputActive(true);
      return;
    }
    if (inputActive && key.escape) {
      setInputActive(false);
    }
  }, { isActive: panelFocused });

  const handleSubmit = useCallback(async (text: string) => {
    if (!text.trim() || submitting) {
      return;
    }
    setInputActive(false);
    setValue('');
    await onSubmit(text);
  }, [onSubmit, submitting]);

  return (
    <Box flexDirection="column" flexGrow={1}>
      <Box>
        <Text color="cyan">› </Text>
        {inputActive ? (
          <TextInput
            value={value}
            onChange={setValue}
            onSubmit={handleSubmit}
            focus={inputActive && panelFocused}
            placeholder="e.g. How many users signed up last month?"
          />
        ) : (
          <Text dimColor>{value || 'Press Enter to ask a question'}</Text>
        )}
      </Box>

      <Box marginTop={1} flexDirection="column">
        {question && (
          <Text wrap="truncate">
            <Text dimColor>asked: </Text>
            {question}
          </Text>
        )}
        {submitting && (
          <Text color="cyan"><Spinner type="dots" /> converting and running…</Text>
        )}
        {!submitting && inProgress && (
          <Text color="yellow"><Spinner type="dots" /> following session…</Text>
        )}
      </Box>
    </Box>
  );
};

export default QuestionPanel;

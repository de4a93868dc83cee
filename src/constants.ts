/**
 * Centralized constants for the front panel.
 *
 * This file contains all magic numbers used across the application
 * to make them easy to find and modify.
 */

/* ------------------------------------------------------------------ */
/*  Engine Constants                                                  */
/* ------------------------------------------------------------------ */

/** scsynth listens for OSC on this host/port unless told otherwise */
export const DEFAULT_SCSYNTH_HOST = "127.0.0.1";
export const DEFAULT_SCSYNTH_PORT = 57110;

/** SynthDef every voice is an instance of */
export const DEFAULT_SYNTHDEF = "peppermint_voice";

/**
 * Private group all voices are added to.  Group 1 is the default group
 * sclang creates and other clients share, so it is never used.
 */
export const DEFAULT_GROUP_ID = 900;

/** Group ids the panel accepts: above the default group, below the voice ids */
export const MIN_GROUP_ID = 2;
export const MAX_GROUP_ID = 999;

/** Maximum polyphony in poly mode */
export const MAX_VOICES = 8;

/** First node id handed out after every boot. Ids below are left to the server and the voice group. */
export const FIRST_NODE_ID = 1000;

/** Node ids are int32 on the wire; the allocator wraps before overflowing */
export const MAX_NODE_ID = 0x7fffffff;

/** How long the worker waits on an empty channel before re-checking for cancellation */
export const COMMAND_POLL_INTERVAL_MS = 100;

/* ------------------------------------------------------------------ */
/*  MIDI Constants                                                    */
/* ------------------------------------------------------------------ */

/** MIDI note range */
export const MIN_MIDI_NOTE = 0;
export const MAX_MIDI_NOTE = 127;

/** MIDI velocity range */
export const MIN_VELOCITY = 0;
export const MAX_VELOCITY = 127;

/** Velocity used by the terminal keyboard */
export const DEFAULT_VELOCITY = 100;

/** Default MIDI channel */
export const DEFAULT_MIDI_CHANNEL = 0;

/** Channel-mode controller number for "All Notes Off" */
export const CC_ALL_NOTES_OFF = 123;

/** MIDI file player look-ahead loop */
export const MIDI_PLAYER_LOOKAHEAD_MS = 25;
export const MIDI_PLAYER_SCHEDULE_AHEAD_S = 0.1;

/* ------------------------------------------------------------------ */
/*  Front Panel Constants                                             */
/* ------------------------------------------------------------------ */

/** Lowest note of the terminal keyboard at octave offset 0 (C4) */
export const KEYBOARD_BASE_NOTE = 60;

/** Number of steps across a parameter's range for one nudge */
export const PARAM_NUDGE_STEPS = 50;

/** Test notes the panel cycles through: A2, A3, A4, A1 */
export const TEST_NOTES: readonly number[] = [45, 57, 69, 33];

/**
 * MCP Tool Schemas
 *
 * Zod schemas for tool inputs. Handlers parse raw input with these; the MCP
 * server advertises their `.shape`.
 */

import { z } from 'zod';
import { DEFAULT_SESSION_ID } from '../session/session-registry.js';

// ============================================================================
// Shared fields
// ============================================================================

/** Session the call applies to; single-tenant callers can omit it */
export const SessionIdSchema = z
  .string()
  .min(1)
  .default(DEFAULT_SESSION_ID)
  .describe('Unique identifier for this client session (default: "default")');

/**
 * Element target fields. Prefer role + name (ARIA); selector is the CSS fallback.
 */
export const ElementTargetShape = {
  /** Human-readable element description, used in result messages */
  element: z.string().optional().describe('Human-readable element description'),
  role: z.string().optional().describe("ARIA role of the element (e.g. 'button', 'link', 'textbox')"),
  name: z.string().optional().describe('Accessible name of the element (from snapshot)'),
  selector: z.string().optional().describe('CSS selector (fallback if role/name not available)'),
};

export const ElementTargetSchema = z.object(ElementTargetShape);

export type ElementTarget = z.infer<typeof ElementTargetSchema>;

const ViewportDimension = z.number().int().positive().max(10000);

// ============================================================================
// Lifecycle
// ============================================================================

export const BrowserOpenInputSchema = z.object({
  session_id: SessionIdSchema,
  /** Launch mode for this session's browser (default: server setting) */
  headless: z.boolean().optional(),
  width: ViewportDimension.optional(),
  height: ViewportDimension.optional(),
});

export type BrowserOpenInput = z.infer<typeof BrowserOpenInputSchema>;

export const BrowserCloseInputSchema = z.object({
  session_id: SessionIdSchema,
});

export type BrowserCloseInput = z.infer<typeof BrowserCloseInputSchema>;

export const SessionListInputSchema = z.object({});

export const SessionCreateInputSchema = z.object({});

// ============================================================================
// Tabs
// ============================================================================

export const BrowserTabsInputSchema = z.object({
  session_id: SessionIdSchema,
  action: z.enum(['list', 'create', 'close', 'select']).describe('Operation to perform'),
  /** Tab index for close/select. close defaults to the active tab */
  index: z.number().int().optional(),
});

export type BrowserTabsInput = z.infer<typeof BrowserTabsInputSchema>;

// ============================================================================
// Navigation and page state
// ============================================================================

export const NavigateInputSchema = z.object({
  session_id: SessionIdSchema,
  url: z.string().url(),
});

export type NavigateInput = z.infer<typeof NavigateInputSchema>;

export const NavigateBackInputSchema = z.object({
  session_id: SessionIdSchema,
});

export const WaitForInputSchema = z.object({
  session_id: SessionIdSchema,
  /** Seconds to wait */
  time: z.number().nonnegative().max(300).optional(),
  /** Text to wait for to appear */
  text: z.string().min(1).optional(),
  /** Text to wait for to disappear */
  text_gone: z.string().min(1).optional(),
});

export type WaitForInput = z.infer<typeof WaitForInputSchema>;

export const ScreenshotInputSchema = z.object({
  session_id: SessionIdSchema,
  type: z.enum(['png', 'jpeg']).default('png'),
  /** Capture the full scrollable page instead of the viewport */
  full_page: z.boolean().default(false),
  ...ElementTargetShape,
});

export type ScreenshotInput = z.infer<typeof ScreenshotInputSchema>;

export const GetHtmlInputSchema = z.object({
  session_id: SessionIdSchema,
  /** CSS selector to read from (default: body) */
  selector: z.string().optional(),
  max_length: z.number().int().positive().default(50000),
});

export type GetHtmlInput = z.infer<typeof GetHtmlInputSchema>;

export const SnapshotInputSchema = z.object({
  session_id: SessionIdSchema,
  /** Only nodes that matter to assistive technology (default: true) */
  interesting_only: z.boolean().default(true),
});

export const EvaluateInputSchema = z.object({
  session_id: SessionIdSchema,
  /** JavaScript function source, e.g. "() => document.title" */
  function: z.string().min(1),
  /** Pass the element matching this selector as the function's argument */
  selector: z.string().optional(),
});

export type EvaluateInput = z.infer<typeof EvaluateInputSchema>;

export const ResizeInputSchema = z.object({
  session_id: SessionIdSchema,
  width: ViewportDimension,
  height: ViewportDimension,
});

export const ConsoleMessagesInputSchema = z.object({
  session_id: SessionIdSchema,
  only_errors: z.boolean().default(false),
});

export const NetworkRequestsInputSchema = z.object({
  session_id: SessionIdSchema,
});

// ============================================================================
// Interaction
// ============================================================================

export const ClickInputSchema = z.object({
  session_id: SessionIdSchema,
  ...ElementTargetShape,
  double_click: z.boolean().default(false),
  button: z.enum(['left', 'right', 'middle']).default('left'),
  modifiers: z.array(z.enum(['Alt', 'Control', 'Meta', 'Shift'])).optional(),
});

export type ClickInput = z.infer<typeof ClickInputSchema>;

export const HoverInputSchema = z.object({
  session_id: SessionIdSchema,
  ...ElementTargetShape,
});

export const TypeInputSchema = z.object({
  session_id: SessionIdSchema,
  ...ElementTargetShape,
  text: z.string(),
  /** Press Enter afterwards */
  submit: z.boolean().default(false),
  /** Type one character at a time instead of filling */
  slowly: z.boolean().default(false),
});

export type TypeInput = z.infer<typeof TypeInputSchema>;

export const PressKeyInputSchema = z.object({
  session_id: SessionIdSchema,
  /** Key name, e.g. ArrowLeft, a, Enter */
  key: z.string().min(1),
});

export const SelectOptionInputSchema = z.object({
  session_id: SessionIdSchema,
  ...ElementTargetShape,
  values: z.array(z.string()).min(1),
});

export const DragInputSchema = z.object({
  session_id: SessionIdSchema,
  start_element: z.string().optional(),
  start_role: z.string().optional(),
  start_name: z.string().optional(),
  start_selector: z.string().optional(),
  end_element: z.string().optional(),
  end_role: z.string().optional(),
  end_name: z.string().optional(),
  end_selector: z.string().optional(),
});

export type DragInput = z.infer<typeof DragInputSchema>;

export const FileUploadInputSchema = z.object({
  session_id: SessionIdSchema,
  /** Absolute file paths. Omit to cancel the chooser */
  paths: z.array(z.string().min(1)).optional(),
  ...ElementTargetShape,
});

export type FileUploadInput = z.infer<typeof FileUploadInputSchema>;

export const FillFormInputSchema = z.object({
  session_id: SessionIdSchema,
  fields: z
    .array(
      z.object({
        ...ElementTargetShape,
        value: z.string(),
      })
    )
    .min(1),
});

export type FillFormInput = z.infer<typeof FillFormInputSchema>;

export const HandleDialogInputSchema = z.object({
  session_id: SessionIdSchema,
  accept: z.boolean(),
  /** Text for prompt() dialogs */
  prompt_text: z.string().optional(),
});

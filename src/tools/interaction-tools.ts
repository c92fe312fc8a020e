/**
 * Interaction Tools
 *
 * Element and keyboard actions on a session's active tab: click, hover,
 * type, press key, select option, drag, file upload, form fill, and arming
 * the next dialog.
 */

import type { Dialog, ElementHandle, Page } from 'puppeteer-core';
import type { SessionRegistry } from '../session/session-registry.js';
import type { ToolDefinition } from '../server/types.js';
import { McpError, ErrorCode, ErrorSeverity, SessionError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import { withFileChooser } from '../browser/file-chooser.js';
import {
  ClickInputSchema,
  HoverInputSchema,
  TypeInputSchema,
  PressKeyInputSchema,
  SelectOptionInputSchema,
  DragInputSchema,
  FileUploadInputSchema,
  FillFormInputSchema,
  HandleDialogInputSchema,
  type DragInput,
} from './tool-schemas.js';
import { actionResult, borrowPage, driverCall } from './page-context.js';
import {
  describeTarget,
  isKeyInput,
  locate,
  toElementError,
  toSelector,
  withElement,
  type TargetFields,
} from './locator.js';

const logger = createLogger('interaction-tools');

/** Delay between keystrokes when typing slowly */
const SLOW_TYPING_DELAY_MS = 50;

/**
 * Run an element action, mapping lookup timeouts to ELEMENT_NOT_FOUND.
 */
async function elementAction<T>(
  sessionId: string,
  target: TargetFields,
  action: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toElementError(error, sessionId, target, action);
  }
}

export async function click(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = ClickInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  // Validate the target before touching the session
  toSelector(input);
  const { page } = await borrowPage(registry, sessionId);
  const modifiers = input.modifiers ?? [];

  await elementAction(sessionId, input, 'click', async () => {
    for (const key of modifiers) {
      await page.keyboard.down(key);
    }
    try {
      await locate(page, input).click({
        button: input.button,
        count: input.double_click ? 2 : 1,
      });
    } finally {
      for (const key of [...modifiers].reverse()) {
        await page.keyboard.up(key);
      }
    }
  });

  const verb = input.double_click ? 'Double-clicked' : 'Clicked';
  return actionResult(page, `${verb} on ${describeTarget(input)}`);
}

export async function hover(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = HoverInputSchema.parse(rawInput);
  toSelector(input);
  const { page } = await borrowPage(registry, input.session_id);

  await elementAction(input.session_id, input, 'hover', () => locate(page, input).hover());
  return actionResult(page, `Hovered over ${describeTarget(input)}`);
}

export async function type(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = TypeInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  toSelector(input);
  const { page } = await borrowPage(registry, sessionId);

  if (input.slowly) {
    await withElement(page, input, sessionId, async (handle) => {
      await driverCall(sessionId, 'type', () => handle.type(input.text, { delay: SLOW_TYPING_DELAY_MS }));
      if (input.submit) {
        await driverCall(sessionId, 'type', () => handle.press('Enter'));
      }
    });
  } else {
    await elementAction(sessionId, input, 'type', () => locate(page, input).fill(input.text));
    if (input.submit) {
      await driverCall(sessionId, 'type', () => page.keyboard.press('Enter'));
    }
  }

  const submitted = input.submit ? ' and submitted' : '';
  return actionResult(page, `Typed '${input.text}' into ${describeTarget(input)}${submitted}`);
}

export async function pressKey(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = PressKeyInputSchema.parse(rawInput);
  const key = input.key;
  if (!isKeyInput(key)) {
    throw new McpError(`Unknown key: ${key}`, ErrorCode.INVALID_INPUT, ErrorSeverity.WARNING, {
      key,
    });
  }
  const { page } = await borrowPage(registry, input.session_id);

  await driverCall(input.session_id, 'press_key', () => page.keyboard.press(key));
  return actionResult(page, `Pressed key: ${key}`);
}

export async function selectOption(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = SelectOptionInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  toSelector(input);
  const { page } = await borrowPage(registry, sessionId);

  const selected = await withElement(page, input, sessionId, (handle) =>
    driverCall(sessionId, 'select_option', () => handle.select(...input.values))
  );
  return {
    ...(await actionResult(page, `Selected ${JSON.stringify(input.values)} in ${describeTarget(input)}`)),
    selected,
  };
}

function dragEnd(input: DragInput, end: 'start' | 'end'): TargetFields {
  return end === 'start'
    ? {
        element: input.start_element,
        role: input.start_role,
        name: input.start_name,
        selector: input.start_selector,
      }
    : {
        element: input.end_element,
        role: input.end_role,
        name: input.end_name,
        selector: input.end_selector,
      };
}

async function centerOf(
  handle: ElementHandle<Element>,
  sessionId: string,
  target: TargetFields
): Promise<{ x: number; y: number }> {
  const box = await driverCall(sessionId, 'drag', () => handle.boundingBox());
  if (!box) {
    throw SessionError.elementNotFound(sessionId, `${describeTarget(target)} is not visible`);
  }
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

export async function drag(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = DragInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  const source = dragEnd(input, 'start');
  const target = dragEnd(input, 'end');
  toSelector(source);
  toSelector(target);
  const { page } = await borrowPage(registry, sessionId);

  const from = await withElement(page, source, sessionId, (handle) => centerOf(handle, sessionId, source));
  const to = await withElement(page, target, sessionId, (handle) => centerOf(handle, sessionId, target));

  await driverCall(sessionId, 'drag', async () => {
    await page.mouse.move(from.x, from.y);
    await page.mouse.down();
    await page.mouse.move(to.x, to.y, { steps: 10 });
    await page.mouse.up();
  });

  return actionResult(page, `Dragged from ${describeTarget(source)} to ${describeTarget(target)}`);
}

/**
 * Supply files to (or cancel) the next file chooser. When a target is given
 * it is clicked to open the chooser.
 */
export async function fileUpload(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = FileUploadInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  const hasTarget = Boolean((input.role && input.name) || input.selector);
  const { page } = await borrowPage(registry, sessionId);

  const trigger = hasTarget
    ? () => elementAction(sessionId, input, 'file_upload', () => locate(page, input).click())
    : undefined;

  const paths = input.paths ?? [];
  const message = await driverCall(sessionId, 'file_upload', () =>
    withFileChooser(page, { trigger }, async (chooser) => {
      if (paths.length === 0) {
        await chooser.cancel();
        return 'File chooser cancelled';
      }
      await chooser.accept(paths);
      return `Uploaded ${paths.length} file(s)`;
    })
  );

  return actionResult(page, message);
}

export async function fillForm(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = FillFormInputSchema.parse(rawInput);
  const sessionId = input.session_id;
  const { page } = await borrowPage(registry, sessionId);

  const filled: string[] = [];
  const errors: string[] = [];

  for (const field of input.fields) {
    const label = field.element ?? field.name ?? field.selector ?? 'field';
    try {
      await elementAction(sessionId, field, 'fill_form', () => locate(page, field).fill(field.value));
      filled.push(describeTarget(field));
    } catch (error) {
      errors.push(`${label}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (filled.length === 0) {
    throw new SessionError(
      `No fields filled: ${errors.join('; ')}`,
      ErrorCode.ELEMENT_NOT_FOUND,
      ErrorSeverity.WARNING,
      { session_id: sessionId, errors }
    );
  }

  let message = `Filled ${filled.length} field(s): ${filled.join(', ')}`;
  if (errors.length > 0) {
    message += `\nErrors: ${errors.join('; ')}`;
  }
  return { ...(await actionResult(page, message)), filled: filled.length, errors };
}

async function respondToDialog(dialog: Dialog, accept: boolean, promptText?: string): Promise<void> {
  try {
    if (accept) {
      await dialog.accept(promptText);
    } else {
      await dialog.dismiss();
    }
  } catch (error) {
    logger.warning('Responding to dialog failed', {
      type: dialog.type(),
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Arm a one-shot handler for the next dialog the active tab opens.
 */
export async function handleDialog(
  registry: SessionRegistry,
  rawInput: unknown
): Promise<Record<string, unknown>> {
  const input = HandleDialogInputSchema.parse(rawInput);
  const { page } = await borrowPage(registry, input.session_id);

  armDialog(page, input.accept, input.prompt_text);
  return { message: `Dialog handler set to ${input.accept ? 'accept' : 'dismiss'}` };
}

function armDialog(page: Page, accept: boolean, promptText?: string): void {
  page.once('dialog', (dialog: Dialog) => {
    void respondToDialog(dialog, accept, promptText);
  });
}

export function createInteractionTools(registry: SessionRegistry): ToolDefinition[] {
  return [
    {
      name: 'browser_click',
      title: 'Click',
      description: 'Click an element. Target it by role + name (preferred) or by CSS selector.',
      inputSchema: ClickInputSchema,
      handler: (input) => click(registry, input),
    },
    {
      name: 'browser_hover',
      title: 'Hover',
      description: 'Hover over an element',
      inputSchema: HoverInputSchema,
      handler: (input) => hover(registry, input),
    },
    {
      name: 'browser_type',
      title: 'Type Text',
      description: 'Type text into an editable element, optionally pressing Enter afterwards',
      inputSchema: TypeInputSchema,
      handler: (input) => type(registry, input),
    },
    {
      name: 'browser_press_key',
      title: 'Press Key',
      description: 'Press a key on the keyboard (e.g. ArrowLeft, a, Enter)',
      inputSchema: PressKeyInputSchema,
      handler: (input) => pressKey(registry, input),
    },
    {
      name: 'browser_select_option',
      title: 'Select Option',
      description: 'Select one or more options in a <select> element',
      inputSchema: SelectOptionInputSchema,
      handler: (input) => selectOption(registry, input),
    },
    {
      name: 'browser_drag',
      title: 'Drag and Drop',
      description: 'Drag from one element to another',
      inputSchema: DragInputSchema,
      handler: (input) => drag(registry, input),
    },
    {
      name: 'browser_file_upload',
      title: 'Upload Files',
      description:
        'Supply files to the next file chooser, or cancel it when no paths are given. Give an element target to click it and open the chooser.',
      inputSchema: FileUploadInputSchema,
      handler: (input) => fileUpload(registry, input),
    },
    {
      name: 'browser_fill_form',
      title: 'Fill Form',
      description: 'Fill several form fields; fields that fail are reported without stopping the rest',
      inputSchema: FillFormInputSchema,
      handler: (input) => fillForm(registry, input),
    },
    {
      name: 'browser_handle_dialog',
      title: 'Handle Dialog',
      description: 'Accept or dismiss the next dialog (alert, confirm, prompt) the page opens',
      inputSchema: HandleDialogInputSchema,
      handler: (input) => handleDialog(registry, input),
    },
  ];
}

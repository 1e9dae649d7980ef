/**
 * @handlekit/element showcase
 *
 * Builds a small dialog against the in-process stub, stores its children
 * as erased handles, pulls the buttons back out with a downcast, and
 * destroys the dialog to show the callback registry emptying itself.
 */

import { bindNativeSystem } from "@handlekit/native";
import { StubNativeSystem } from "@handlekit/testing";
import {
  Button,
  Dialog,
  Label,
  VBox,
  append,
  createElement,
  elements,
  globalCallbackRegistry,
  onDestroy,
  onMap,
  tryDowncast,
  type Button as ButtonElement,
} from "../src/index.js";

const stub = new StubNativeSystem();
bindNativeSystem(stub);

// ============================================================================
// 1. Typed construction
// ============================================================================

const dialog = createElement(Dialog).setAttribute("TITLE", "Save changes?");
const box = createElement(VBox);
const message = createElement(Label).setAttribute("TITLE", "You have unsaved changes.");
const save = createElement(Button).setAttribute("TITLE", "Save");
const discard = createElement(Button).setAttribute("TITLE", "Discard");

append(dialog, box);
for (const child of [message, save, discard]) {
  append(box, child);
}

onMap(dialog, (d) => {
  console.log(`${d} mapped with title ${d.getAttribute("TITLE") ?? "(none)"}`);
});
onDestroy(dialog, (d) => {
  console.log(`${d} is going away`);
});

// ============================================================================
// 2. Heterogeneous storage and downcast
// ============================================================================

const children = elements(message, save, discard);

const buttons: ButtonElement[] = [];
for (const child of children) {
  const result = tryDowncast(child, Button);
  if (result.ok) {
    buttons.push(result.value);
  } else {
    console.log(`${result.error} is a ${result.error.className()}, skipped`);
  }
}
console.log(`buttons: ${buttons.map((b) => b.getAttribute("TITLE")).join(", ")}`);

// ============================================================================
// 3. Status results
// ============================================================================

const shown = dialog.show();
if (!shown.ok) {
  console.error(shown.error.message);
}

// ============================================================================
// 4. Teardown
// ============================================================================

console.log(`registry entries before destroy: ${globalCallbackRegistry.size}`);
dialog.destroy();
console.log(`registry entries after destroy: ${globalCallbackRegistry.size}`);

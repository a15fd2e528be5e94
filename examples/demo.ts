import * as os from "os";
import { Keywire } from "../src/keywire";

// Resolves once the drained screen contains the text
function screenShows(keywire: Keywire, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const check = () =>
      keywire.drain().then(() => {
        if (keywire.getSnapshot().text.includes(text)) {
          subscription.dispose();
          resolve();
        }
      });
    const subscription = keywire.onOutput(() => {
      check().catch(reject);
    });
    check().catch(reject);
  });
}

async function main() {
  console.log("--- Keywire Demo Start ---");

  // 1. Launch (Backend + Session)
  const shell = os.platform() === "win32" ? "powershell.exe" : "bash";
  console.log(`> Using shell: ${shell}`);

  let clipboardText = "";
  const keywire = await Keywire.launch({
    cols: 80,
    rows: 24,
    backend: {
      type: "localPty",
      file: shell,
      args: [],
      env: process.env,
    },
    clipboard: { setText: (text) => { clipboardText = text; } },
    ui: { requestRedraw: () => console.log("  (redraw requested)") },
  });

  // 2. Scenario: typed batch + Enter
  console.log("\n--- Scenario 1: Typed batch ---");
  keywire.type('echo "Hello Keywire"');
  keywire.press("Enter");
  await screenShows(keywire, "Hello Keywire");
  console.log('✅ "Hello Keywire" detected!');

  // 3. Scenario: sticky Ctrl from a soft keyboard
  console.log("\n--- Scenario 2: Sticky Ctrl ---");
  keywire.type("sleep 30");
  console.log("> Tapping Ctrl, then C");
  keywire.applyModifier("ctrl");
  console.log(`  ctrl: ${JSON.stringify(keywire.getModifierState().ctrl)}`);
  keywire.press("KeyC");
  await screenShows(keywire, "^C");
  console.log("✅ ^C echoed");

  // 4. Scenario: copy the first row through the selection cursor
  console.log("\n--- Scenario 3: Selection ---");
  keywire.startSelection({ col: 0, row: 0 });
  keywire.press("Center");
  for (let i = 0; i < 20; i++) keywire.press("ArrowRight");
  keywire.press("Center");
  console.log(`> Copied: "${clipboardText}"`);

  // 5. Inspect Snapshot
  console.log("\n--- Final Snapshot ---");
  const snapshot = keywire.getSnapshot();
  console.log("----------------------------------------");
  console.log(snapshot.text);
  console.log("----------------------------------------");
  console.log(`Cursor: (${snapshot.cursorSnapshot.x}, ${snapshot.cursorSnapshot.y})`);

  // Cleanup
  console.log("\n> Cleaning up...");
  keywire.dispose();
  console.log("--- Keywire Demo Finished ---");
}

main().catch((err) => {
  console.error("Demo failed:", err);
  process.exit(1);
});

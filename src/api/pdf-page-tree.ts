import { InvalidArgumentError } from "#src/errors";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfRef } from "#src/objects/pdf-ref";
import type { PDFContext } from "./pdf-context";

/**
 * A node on the way from the root /Pages to a page.
 */
interface PathNode {
  dict: PdfDict;
  kids: PdfArray;
}

/**
 * Page tree of a document: the /Pages node of the catalog and its /Kids.
 *
 * Nothing is cached. Pages are found by walking the tree on every call, so
 * edits made through handles are always seen. A node with a /Kids array is
 * an intermediate node; anything else reached through /Kids is a page.
 */
export class PDFPageTree {
  constructor(private readonly ctx: PDFContext) {}

  /**
   * Page references in document order. Cycles and direct (non-reference)
   * kids are skipped with a warning.
   */
  getPages(): PdfRef[] {
    const pages: PdfRef[] = [];

    this.walk((ref) => {
      pages.push(ref);

      return false;
    });

    return pages;
  }

  getPageCount(): number {
    return this.getPages().length;
  }

  /**
   * Page reference at `index`, or undefined when out of range.
   */
  getPage(index: number): PdfRef | undefined {
    if (index < 0) {
      return undefined;
    }

    return this.getPages()[index];
  }

  /**
   * Append (or, with `first`, prepend) a page to the root node's /Kids.
   * Sets /Type /Page and /Parent on the page and updates /Count. A page
   * that is already in the tree is added as a new copy of itself.
   *
   * @returns the reference now in the tree
   */
  addPage(pageRef: PdfRef, first = false): PdfRef {
    const existing = this.ctx.resolve(pageRef);

    if (existing?.type !== "dict") {
      throw new InvalidArgumentError(`Page ${pageRef} is not a dictionary`);
    }

    let page = existing;

    if (this.getPages().includes(pageRef)) {
      page = existing.clone();
      pageRef = this.ctx.register(page);
    }

    const { ref: rootRef, dict: root } = this.ensureRoot();
    let kids = this.ctx.deref(root.get("Kids"));

    if (kids?.type !== "array") {
      kids = new PdfArray();
      root.set("Kids", kids);
    }

    if (first) {
      kids.insert(0, pageRef);
    } else {
      kids.push(pageRef);
    }

    root.set("Count", PdfNumber.of(this.countOf(root) + 1));
    page.set("Type", PdfName.of("Page"));
    page.set("Parent", rootRef);

    return pageRef;
  }

  /**
   * Remove a page from its parent's /Kids and decrement /Count on every
   * node above it. The page object itself stays in the document.
   *
   * @throws {InvalidArgumentError} if the page is not in the tree
   */
  removePage(pageRef: PdfRef): void {
    let path: PathNode[] = [];

    this.walk((ref, ancestors) => {
      if (ref !== pageRef) {
        return false;
      }

      path = ancestors;

      return true;
    });

    const parent = path.at(-1);

    if (parent === undefined) {
      throw new InvalidArgumentError(`Page ${pageRef} is not in the page tree`);
    }

    const index = parent.kids.toArray().indexOf(pageRef);

    parent.kids.remove(index);

    for (const node of path) {
      node.dict.set("Count", PdfNumber.of(Math.max(0, this.countOf(node.dict) - 1)));
    }

    const page = this.ctx.resolve(pageRef);

    if (page?.type === "dict") {
      page.delete("Parent");
    }
  }

  /**
   * Depth-first walk. `visit` gets each page with the intermediate nodes
   * above it and returns true to stop.
   */
  private walk(visit: (ref: PdfRef, ancestors: PathNode[]) => boolean): void {
    const catalog = this.ctx.deref(this.ctx.trailer.get("Root"));

    if (catalog?.type !== "dict") {
      return;
    }

    const rootValue = catalog.get("Pages");

    if (rootValue?.type !== "ref") {
      return;
    }

    const visited = new Set<PdfRef>([rootValue]);

    const descend = (node: PdfDict, ancestors: PathNode[]): boolean => {
      const kids = this.ctx.deref(node.get("Kids"));

      if (kids?.type !== "array") {
        return false;
      }

      const path = [...ancestors, { dict: node, kids }];

      for (const kid of kids) {
        if (kid.type !== "ref") {
          this.ctx.addWarning("Page tree /Kids entry is not a reference, skipped");
          continue;
        }

        if (visited.has(kid)) {
          this.ctx.addWarning(`Page tree cycle at ${kid}, skipped`);
          continue;
        }

        visited.add(kid);

        const child = this.ctx.resolve(kid);

        if (child?.type !== "dict") {
          continue;
        }

        const done = child.has("Kids") ? descend(child, path) : visit(kid, path);

        if (done) {
          return true;
        }
      }

      return false;
    };

    const root = this.ctx.resolve(rootValue);

    if (root?.type === "dict") {
      descend(root, []);
    }
  }

  /**
   * The root /Pages node, created (and linked from the catalog) when the
   * catalog has none.
   */
  private ensureRoot(): { ref: PdfRef; dict: PdfDict } {
    const catalog = this.ctx.deref(this.ctx.trailer.get("Root"));

    if (catalog?.type !== "dict") {
      throw new InvalidArgumentError("Document has no catalog");
    }

    const existing = catalog.get("Pages");

    if (existing?.type === "ref") {
      const dict = this.ctx.resolve(existing);

      if (dict?.type === "dict") {
        return { ref: existing, dict };
      }
    }

    const dict = PdfDict.of({
      Type: PdfName.of("Pages"),
      Kids: new PdfArray(),
      Count: PdfNumber.of(0),
    });
    const ref = this.ctx.register(dict);

    catalog.set("Pages", ref);

    return { ref, dict };
  }

  private countOf(node: PdfDict): number {
    const count = this.ctx.deref(node.get("Count"));

    return count?.type === "number" ? count.value : 0;
  }
}

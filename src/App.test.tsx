import { describe, it, expect } from "vitest";
import { renderToStaticMarkup } from "react-dom/server";
import SearchLab from "./App";

describe("SearchLab", () => {
  const html = renderToStaticMarkup(<SearchLab />);

  it("renders one panel per algorithm", () => {
    expect(html.match(/<canvas/g)).toHaveLength(4);
    for (const label of ["BFS-Graph", "DFS-Graph", "UCS-Graph", "A*-Graph-Euclidean"]) {
      expect(html).toContain(`<h2 class="font-semibold">${label}</h2>`);
    }
  });

  it("starts idle with an empty finish order", () => {
    expect(html.match(/>Idle</g)).toHaveLength(4);
    expect(html).toContain("No algorithm has finished yet.");
  });

  it("shows the generated map's endpoints", () => {
    expect(html).toContain("Start: (1,1) · Goal: (13,13)");
  });

  it("offers endpoint inputs and hides the density slider on Rooms", () => {
    expect(html.match(/placeholder="map default"/g)).toHaveLength(2);
    expect(html).not.toContain("Obstacle density");
    expect(html).not.toContain("text-red-600");
  });

  it("styles its buttons with utility classes", () => {
    expect(html).toContain(
      'class="px-4 py-2 rounded-xl bg-emerald-600 text-white disabled:opacity-50">Start</button>'
    );
  });
});

// @vitest-environment jsdom
import React from "react";
import { afterEach, describe, expect, it, vi } from "vitest";
import { act, cleanup, fireEvent, render, screen } from "@testing-library/react";

const { copyText } = vi.hoisted(() => ({ copyText: vi.fn<(text: string) => Promise<void>>(async () => {}) }));

vi.mock("./components/RadarPanel", () => ({ default: () => null }));
vi.mock("./lib/clipboard", () => ({ copyText }));

import App from "./App";

const result = {
  scores: { innovation: 90, collaboration: 75, leadership: 60, tech_acumen: 85 },
  analysis: "擅长从细节里找到突破口。",
  golden_sentence: "把好奇心写进代码",
};
const chart = { title: "Alex 的 AI 潜力雷达图", domain: [0, 100], points: [] };
const SHARE_URL = "https://profile.example.com/app/?share=share-001";
const analyzed = { nickname: "Alex", result, chart, share: { saved: true, shareId: "share-001", url: SHARE_URL } };

const jsonResponse = (status: number, body: unknown) =>
  vi.fn(async () => new Response(JSON.stringify(body), { status }));

function fillForm(container: HTMLElement) {
  const set = (id: string, value: string) => {
    const el = container.querySelector(`#${id}`);
    if (!el) throw new Error(`missing #${id}`);
    fireEvent.change(el, { target: { value } });
  };
  set("nickname", "Alex");
  set("innovation", "Built a new caching layer");
  set("collaboration", "Led standup");
  set("leadership", "Reassigned tasks");
  set("tech_acumen", "Excited about agents");
}

function submit(container: HTMLElement) {
  const form = container.querySelector("form");
  if (!form) throw new Error("missing form");
  fireEvent.submit(form);
}

afterEach(() => {
  cleanup();
  vi.useRealTimers();
  copyText.mockClear();
  vi.unstubAllGlobals();
  window.history.replaceState(null, "", "/");
});

describe("App", () => {
  it("warns and skips the request when an answer is missing", () => {
    const fetchMock = jsonResponse(200, {});
    vi.stubGlobal("fetch", fetchMock);
    const { container } = render(<App base="http://api.test" />);

    submit(container);

    expect(screen.getByRole("alert").textContent).toBe("⚠️ 请完整回答所有四个问题，这样AI才能给出更准确的分析哦！");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("shows the usage guide beside the form", () => {
    render(<App base="http://api.test" />);

    expect(screen.getByText("📋 使用说明")).toBeTruthy();
    expect(screen.getByTestId("guide-steps").children).toHaveLength(5);
    expect(screen.getByText("真实回答比完美回答更有价值")).toBeTruthy();
  });

  it("shows scores, slogan and share link after analysis", async () => {
    vi.stubGlobal("fetch", jsonResponse(200, analyzed));
    const { container } = render(<App base="http://api.test" />);

    fillForm(container);
    submit(container);

    expect((await screen.findByTestId("golden-sentence")).textContent).toBe("✨ 把好奇心写进代码 ✨");
    expect(screen.getByTestId("score-innovation").textContent).toBe("🧠 创新指数：90/100");
    expect(screen.getByTestId("score-tech_acumen").textContent).toBe("⚡ 技术敏感度：85/100");
    expect(screen.getByTestId("share-url").textContent).toBe(SHARE_URL);
    expect(screen.getByAltText("分享二维码").getAttribute("src")).toBe("http://api.test/share/share-001/qr.png");
  });

  it("copies the server's share link and keeps the notice for the latest copy", async () => {
    vi.stubGlobal("fetch", jsonResponse(200, analyzed));
    const { container } = render(<App base="http://api.test" />);
    fillForm(container);
    submit(container);
    const copyLink = await screen.findByText("🔗 复制分享链接");

    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    await act(async () => {
      fireEvent.click(copyLink);
      await vi.advanceTimersByTimeAsync(1500);
    });
    expect(copyText).toHaveBeenCalledWith(SHARE_URL);
    expect(screen.getByText("已复制")).toBeTruthy();

    // the first copy's reset is due at 2000 ms and must not fire
    await act(async () => {
      fireEvent.click(copyLink);
      await vi.advanceTimersByTimeAsync(1000);
    });
    expect(screen.getByText("已复制")).toBeTruthy();

    await act(async () => {
      await vi.advanceTimersByTimeAsync(1000);
    });
    expect(screen.queryByText("已复制")).toBeNull();

    await act(async () => {
      fireEvent.click(copyLink);
      await vi.advanceTimersByTimeAsync(0);
    });
    expect(vi.getTimerCount()).toBe(1);
    cleanup();
    expect(vi.getTimerCount()).toBe(0);
  });

  it("shows the server's message when analysis fails", async () => {
    vi.stubGlobal("fetch", jsonResponse(502, { error: { kind: "transport", message: "AI 服务暂时无法连接" } }));
    const { container } = render(<App base="http://api.test" />);

    fillForm(container);
    submit(container);

    expect((await screen.findByRole("alert")).textContent).toBe("AI 服务暂时无法连接");
  });

  it("replays a shared record without showing the form", async () => {
    window.history.replaceState(null, "", "/?share=abc");
    const fetchMock = jsonResponse(200, {
      record: { timestamp: "2026-07-04T09:30:00.000Z", share_id: "abc", nickname: "Alex" },
      result,
      chart,
      shareUrl: "https://profile.example.com/app/?share=abc",
    });
    vi.stubGlobal("fetch", fetchMock);

    const { container } = render(<App base="http://api.test" />);

    expect((await screen.findByTestId("golden-sentence")).textContent).toBe("✨ 把好奇心写进代码 ✨");
    expect(container.querySelector("form")).toBeNull();
    expect(fetchMock).toHaveBeenCalledWith("http://api.test/share/abc");
    expect(screen.getByTestId("share-url").textContent).toBe("https://profile.example.com/app/?share=abc");
  });
});

import { render, screen, waitFor } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import RatingPage, { ANNOTATOR_STORAGE_KEY } from "../RatingPage";
import { performAction, sessionApi } from "../../services/api";
import { apiFailure, makeView, ok } from "../../test/fixtures";

vi.mock("../../services/api", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../services/api")>();
  return {
    ...actual,
    sessionApi: { ...actual.sessionApi, get: vi.fn(), toggleFilter: vi.fn() },
    performAction: vi.fn(),
  };
});

const rated = makeView({
  index: 1,
  image_identifier: "b.jpg",
  image_url: "/images/b.jpg",
  can_undo: true,
  history_size: 1,
  at_start: false,
  stats: { total: 3, annotated: 1, marked: 0, remaining: 2, percentage: 33 },
});

describe("RatingPage", () => {
  beforeEach(() => {
    window.localStorage.clear();
    vi.mocked(sessionApi.get).mockResolvedValue(ok(makeView()));
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("shows the current image once the session loads", async () => {
    render(<RatingPage />);

    expect(await screen.findByText("Current: a.jpg")).toBeInTheDocument();
    expect(screen.getByRole("img", { name: "a.jpg" })).toHaveAttribute("src", "/images/a.jpg");
    expect(screen.getByText("Not rated")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Undo (U)" })).toBeDisabled();
    expect(screen.getByRole("button", { name: /Previous/ })).toBeDisabled();
  });

  it("rates with a digit key and renders the next image", async () => {
    const user = userEvent.setup();
    vi.mocked(performAction).mockResolvedValue(ok(rated));
    render(<RatingPage />);
    await screen.findByText("Current: a.jpg");

    await user.keyboard("3");

    expect(performAction).toHaveBeenCalledWith({ type: "rate", rating: 3 }, undefined);
    expect(await screen.findByText("Current: b.jpg")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Undo (U)" })).toBeEnabled();
  });

  it("ignores digits above the number of classes", async () => {
    const user = userEvent.setup();
    render(<RatingPage />);
    await screen.findByText("Current: a.jpg");

    await user.keyboard("7");

    expect(performAction).not.toHaveBeenCalled();
  });

  it("sends the stored annotator name with a clicked rating", async () => {
    const user = userEvent.setup();
    window.localStorage.setItem(ANNOTATOR_STORAGE_KEY, "alice");
    vi.mocked(performAction).mockResolvedValue(ok(rated));
    render(<RatingPage />);
    await screen.findByText("Current: a.jpg");

    await user.click(screen.getByRole("button", { name: "2" }));

    expect(performAction).toHaveBeenCalledWith({ type: "rate", rating: 2 }, "alice");
  });

  it("falls back to the server user once the annotator name is cleared", async () => {
    const user = userEvent.setup();
    window.localStorage.setItem(ANNOTATOR_STORAGE_KEY, "bob");
    vi.mocked(performAction).mockResolvedValue(ok(rated));
    render(<RatingPage />);
    await screen.findByText("Current: a.jpg");

    await user.clear(screen.getByRole("textbox"));
    await user.tab();
    await user.click(screen.getByRole("button", { name: "3" }));

    expect(performAction).toHaveBeenCalledWith({ type: "rate", rating: 3 }, undefined);
    expect(window.localStorage.getItem(ANNOTATOR_STORAGE_KEY)).toBeNull();
  });

  it("does not treat typing in the annotator field as shortcuts", async () => {
    const user = userEvent.setup();
    render(<RatingPage />);
    await screen.findByText("Current: a.jpg");

    await user.type(screen.getByRole("textbox"), "bob3");

    expect(performAction).not.toHaveBeenCalled();
  });

  it("shows a notice when there is nothing to undo", async () => {
    const user = userEvent.setup();
    vi.mocked(performAction).mockRejectedValue(
      apiFailure(409, { detail: "Nothing to undo", code: "nothing_to_undo" }),
    );
    render(<RatingPage />);
    await screen.findByText("Current: a.jpg");

    await user.keyboard("u");

    expect(performAction).toHaveBeenCalledWith({ type: "undo" }, undefined);
    expect(await screen.findByRole("status")).toHaveTextContent("Nothing to undo");
    expect(screen.queryByRole("alert")).not.toBeInTheDocument();
  });

  it("keeps the image and reports a failed save", async () => {
    const user = userEvent.setup();
    vi.mocked(performAction).mockRejectedValue(
      apiFailure(503, { detail: "disk full", code: "storage_unavailable" }),
    );
    render(<RatingPage />);
    await screen.findByText("Current: a.jpg");

    await user.keyboard("4");

    expect(await screen.findByRole("alert")).toHaveTextContent("Error: disk full");
    expect(screen.getByText("Current: a.jpg")).toBeInTheDocument();
  });

  it("toggles the unannotated filter", async () => {
    const user = userEvent.setup();
    vi.mocked(sessionApi.toggleFilter).mockResolvedValue(ok(makeView({ filter_unannotated: true })));
    render(<RatingPage />);
    await screen.findByText("Current: a.jpg");

    await user.click(screen.getByRole("checkbox", { name: /Show unannotated only/ }));

    expect(sessionApi.toggleFilter).toHaveBeenCalledTimes(1);
    await waitFor(() =>
      expect(screen.getByRole("checkbox", { name: /Show unannotated only/ })).toBeChecked(),
    );
  });

  it("shows the load error when the session cannot be fetched", async () => {
    vi.mocked(sessionApi.get).mockRejectedValue(
      apiFailure(500, { detail: "Internal server error", code: "internal_error" }),
    );
    render(<RatingPage />);

    expect(await screen.findByText("Internal server error")).toBeInTheDocument();
  });
});

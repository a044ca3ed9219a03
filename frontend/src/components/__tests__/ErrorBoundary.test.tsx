import { render, screen } from "@testing-library/react";
import ErrorBoundary from "../ErrorBoundary";

function Broken(): JSX.Element {
  throw new Error("view exploded");
}

describe("ErrorBoundary", () => {
  it("shows the error message instead of the crashed view", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});

    render(
      <ErrorBoundary>
        <Broken />
      </ErrorBoundary>,
    );

    expect(screen.getByRole("heading", { name: "The rating view crashed" })).toBeInTheDocument();
    expect(screen.getByText("view exploded")).toBeInTheDocument();
    consoleError.mockRestore();
  });

  it("renders a custom fallback", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});

    render(
      <ErrorBoundary fallback={<p>custom fallback</p>}>
        <Broken />
      </ErrorBoundary>,
    );

    expect(screen.getByText("custom fallback")).toBeInTheDocument();
    consoleError.mockRestore();
  });
});

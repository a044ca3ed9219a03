import { useState, useEffect } from "react";

interface AnnotatorFieldProps {
  value?: string;
  onChange: (username: string) => void;
  disabled?: boolean;
  placeholder?: string;
}

/**
 * Name written with every rating. Commits on blur or Enter, not on every
 * keystroke, so a half-typed name never ends up in the datastore.
 */
export default function AnnotatorField({
  value = "",
  onChange,
  disabled = false,
  placeholder = "Your name (defaults to the server user)",
}: AnnotatorFieldProps) {
  const [draft, setDraft] = useState<string>(value);

  // Follow outside resets (e.g. the stored name being cleared)
  useEffect(() => {
    setDraft(value);
  }, [value]);

  // An emptied field commits "" so writes fall back to the server user
  const commit = () => {
    const trimmed = draft.trim();
    if (trimmed !== value) {
      onChange(trimmed);
    }
  };

  const handleKeyDown = (e: React.KeyboardEvent<HTMLInputElement>) => {
    if (e.key === "Enter") {
      commit();
    }
  };

  return (
    <label className="annotator-field">
      Annotator:{" "}
      <input
        type="text"
        value={draft}
        onChange={(e) => setDraft(e.target.value)}
        onBlur={commit}
        onKeyDown={handleKeyDown}
        placeholder={placeholder}
        disabled={disabled}
      />
    </label>
  );
}

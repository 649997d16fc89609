export function NotepadApp() {
  return <textarea className="notepad" aria-label="Notes" placeholder="Type here..." spellCheck={false} />
}

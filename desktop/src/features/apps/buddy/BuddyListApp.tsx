export function BuddyListApp() {
  return (
    <div className="buddy-list">
      <div className="buddy-list__header">Buddies Online (0)</div>
      <div className="buddy-list__empty">Your buddy list is empty.</div>
    </div>
  )
}

type EmptyStateProps = {
  filtered: boolean
  onReset?: () => void
}

export default function EmptyState({ filtered, onReset }: EmptyStateProps) {
  return (
    <div className="empty-state">
      <div className="empty-card">
        {filtered ? (
          <>
            <h3>No papers match these filters</h3>
            <p>Try another semester or exam type, or clear the filters.</p>
            {onReset ? (
              <button type="button" className="btn btn-ghost" onClick={onReset}>
                Clear filters
              </button>
            ) : null}
          </>
        ) : (
          <>
            <h3>No papers yet</h3>
            <p>Papers appear here once an administrator uploads them.</p>
          </>
        )}
      </div>
    </div>
  )
}

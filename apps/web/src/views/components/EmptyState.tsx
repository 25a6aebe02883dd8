type EmptyStateProps = {
  message: string;
  actionHref?: string;
  actionLabel?: string;
};

export default function EmptyState({ message, actionHref = "/", actionLabel = "Continue shopping" }: EmptyStateProps) {
  return (
    <div className="empty-state text-center py-5">
      <p className="lead mb-3">{message}</p>
      <a className="btn btn-outline-dark" href={actionHref}>
        {actionLabel}
      </a>
    </div>
  );
}
